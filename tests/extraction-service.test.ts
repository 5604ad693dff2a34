/**
 * End-to-end extraction over in-memory catalog layers
 */
import { describe, expect, it } from "vitest";
import { ArchiveOverlay } from "../src/archive-overlay.js";
import { MalformedDefinitionError } from "../src/errors.js";
import { ExtractionService } from "../src/extraction-service.js";
import { type FileMap, memoryLayer } from "./helpers.js";

const BASE: FileMap = {
  "index/macros.xml": `<index>
    <entry name="storage_test_macro" value="assets\\props\\storagemodules\\macros\\storage_test_macro"/>
  </index>`,
  "index/components.xml": `<index>
    <entry name="ship_test_s" value="assets\\units\\size_s\\ship_test_s"/>
  </index>`,
  "assets/units/size_s/ship_test_s.xml": `<components>
    <component name="ship_test_s" class="ship_s">
      <connections>
        <connection name="con_engine_01" tags="engine small"/>
        <connection name="con_shield_01" tags="shield small"/>
      </connections>
    </component>
  </components>`,
  "assets/units/size_s/macros/ship_test_s_macro.xml": `<macros>
    <macro name="ship_test_s_macro" class="ship_s">
      <component ref="ship_test_s"/>
      <properties><hull max="2500"/></properties>
      <connections>
        <connection ref="con_storage"><macro ref="storage_test_macro" connection="ShipConnection"/></connection>
        <connection ref="con_engine_01"><macro ref="engine_test_macro" connection="ShipConnection"/></connection>
      </connections>
    </macro>
  </macros>`,
  "assets/props/storagemodules/macros/storage_test_macro.xml": `<macros>
    <macro name="storage_test_macro" class="storage">
      <properties><cargo max="400" tags="container"/></properties>
    </macro>
  </macros>`,
  "assets/props/engines/macros/engine_test_macro.xml": `<macros>
    <macro name="engine_test_macro" class="engine">
      <properties><thrust forward="100"/><travel thrust="3"/></properties>
    </macro>
  </macros>`,
  "libraries/wares.xml": `<wares>
    <ware id="energycells" name="{20201,701}" transport="container" volume="6">
      <price min="10" average="16" max="22"/>
    </ware>
  </wares>`,
};

const PATCH: FileMap = {
  "assets/props/engines/macros/engine_test_macro.xml": `<macros>
    <macro name="engine_test_macro" class="engine">
      <properties><thrust forward="200"/><travel thrust="3"/></properties>
    </macro>
  </macros>`,
};

function overlay(extra: FileMap = {}): ArchiveOverlay {
  return new ArchiveOverlay([memoryLayer(1, BASE), memoryLayer(2, { ...PATCH, ...extra })]);
}

describe("ExtractionService", () => {
  it("loads classes, follows the index and resolves every requested class", async () => {
    const service = new ExtractionService(overlay());
    const progress: string[] = [];
    const { results, stats } = await service.extract(["engines", "ships", "wares"], (msg) => progress.push(msg));

    const engines = results.get("engines")?.records ?? [];
    expect(engines.map((r) => r.id)).toEqual(["engine_test_macro"]);
    expect(engines[0].attributes.thrust_forward).toBe(200);
    expect(engines[0].attributes.travel_thrust).toBe(600);

    const [ship] = results.get("ships")?.records ?? [];
    expect(ship.id).toBe("ship_test_s_macro");
    expect(ship.attributes).toMatchObject({ class: "s", hull: 2500, cargobay: 400, storage: ["container"], num_engines: 1, num_shields: 1 });
    expect(ship.connections.map((c) => [c.role, c.embed])).toEqual([
      ["con_storage", "nested"],
      ["con_engine_01", "summary"],
    ]);

    const [ware] = results.get("wares")?.records ?? [];
    expect(ware.attributes).toMatchObject({ name: "{20201,701}", group: "container", volume: 6, price_min: 10, price_max: 22 });

    expect(stats).toMatchObject({
      documents: 5,
      records: { engines: 1, ships: 1, wares: 1 },
      failures: 0,
      diagnostics: [],
      errors: [],
    });
    expect(progress).toContain("Dependencies: 2 more documents");
    expect(progress).toContain("ships: 1 records");
  });

  it("reports references that no loaded document or index entry defines", async () => {
    const service = new ExtractionService(overlay());
    const { results, stats } = await service.extract(["ships"]);

    const [ship] = results.get("ships")?.records ?? [];
    expect(ship.connections[1]).toEqual({
      role: "con_engine_01",
      target: "engine_test_macro",
      kind: null,
      embed: null,
      attributes: null,
      connections: [],
    });
    expect(stats.diagnostics.map((d) => [d.code, d.objectId, d.reference])).toEqual([
      ["UnresolvedReference", "ship_test_s_macro", "engine_test_macro"],
    ]);
  });

  it("aborts on a broken document by default", async () => {
    const service = new ExtractionService(overlay({ "assets/props/engines/macros/engine_broken.xml": "<macros><macro name='x'>" }));
    await expect(service.extract(["engines"])).rejects.toBeInstanceOf(MalformedDefinitionError);
  });

  it("skips broken documents when asked to", async () => {
    const service = new ExtractionService(
      overlay({ "assets/props/engines/macros/engine_broken.xml": "<macros><macro name='x'>" }),
      { onDocumentError: "skip" },
    );
    const { results, stats } = await service.extract(["engines"]);

    expect(results.get("engines")?.records.map((r) => r.id)).toEqual(["engine_test_macro"]);
    expect(stats.diagnostics).toHaveLength(1);
    expect(stats.diagnostics[0]).toMatchObject({
      code: "SkippedDocument",
      severity: "error",
      path: "assets/props/engines/macros/engine_broken.xml",
    });
    expect(stats.errors).toHaveLength(1);
    expect(stats.errors[0]).toMatch(/^Malformed definition assets\/props\/engines\/macros\/engine_broken\.xml: /);
  });

  it("collects inheritance cycles as failures", async () => {
    const service = new ExtractionService(
      overlay({
        "assets/props/engines/macros/engine_loop.xml": `<macros>
          <macro name="engine_loop_a" class="engine" extends="engine_loop_b"/>
          <macro name="engine_loop_b" class="engine" extends="engine_loop_a"/>
        </macros>`,
      }),
    );
    const { results, stats } = await service.extract(["engines", "ships"]);
    expect(results.get("engines")?.failures.map((f) => f.objectId)).toEqual(["engine_loop_a", "engine_loop_b"]);
    expect(results.get("ships")?.failures).toEqual([]);
    expect(stats.failures).toBe(2);
    expect(stats.errors).toEqual([
      "Inheritance cycle: engine_loop_a -> engine_loop_b -> engine_loop_a",
      "Inheritance cycle: engine_loop_a -> engine_loop_b -> engine_loop_a",
    ]);
  });
});
