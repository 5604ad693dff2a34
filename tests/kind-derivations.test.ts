/**
 * Tests for per-kind derived attributes
 */
import { describe, expect, it } from "vitest";
import { DefinitionGraph } from "../src/definition-graph.js";
import { parseDefinitions } from "../src/definition-parser.js";
import { indexedGroups, sizeFromTags } from "../src/kind-derivations.js";
import { MacroResolver } from "../src/macro-resolver.js";

function resolverFor(documents: Record<string, string>): MacroResolver {
  const graph = new DefinitionGraph();
  for (const [source, xml] of Object.entries(documents)) graph.add(parseDefinitions(xml, source));
  return new MacroResolver(graph);
}

// ── Helpers ─────────────────────────────────────────────────

describe("derivation helpers", () => {
  it("finds the size tag among connection tags", () => {
    expect(sizeFromTags(["engine", "medium", "platformcollision"])).toBe("medium");
    expect(sizeFromTags(["engine"])).toBeNull();
  });

  it("splits indexed and unindexed property groups", () => {
    const raw = new Map([
      ["owner[0].faction", "argon"],
      ["owner[1].faction", "teladi"],
      ["price.min", "1"],
    ]);
    expect(indexedGroups(raw, "owner").map((g) => g.get("faction"))).toEqual(["argon", "teladi"]);
    expect(indexedGroups(new Map([["owner.faction", "paranid"]]), "owner").map((g) => g.get("faction"))).toEqual(["paranid"]);
  });
});

// ── Engines ─────────────────────────────────────────────────

describe("engine derivations", () => {
  const resolver = resolverFor({
    "assets/props/engines/engine_arg_m_01.xml": `<components>
      <component name="engine_arg_m_01" class="engine">
        <connections><connection name="con_1" tags="engine medium"/></connections>
      </component>
      <component name="thruster_gen_s_01" class="engine">
        <connections><connection name="con_1" tags="thruster small"/></connections>
      </component>
      <component name="generic_engine" class="engine">
        <connections><connection name="con_1" tags="engine large"/></connections>
      </component>
    </components>`,
    "assets/props/engines/macros/engines.xml": `<macros>
      <macro name="engine_arg_m_allround_01_mk1_macro" class="engine">
        <component ref="engine_arg_m_01"/>
        <properties>
          <thrust forward="1500" reverse="1200"/>
          <boost duration="10" thrust="8"/>
          <travel charge="12" thrust="16.5"/>
        </properties>
      </macro>
      <macro name="thruster_gen_s_allround_01_mk1_macro" class="engine">
        <component ref="thruster_gen_s_01"/>
      </macro>
      <macro name="engine_generic_macro" class="engine">
        <component ref="generic_engine"/>
      </macro>
    </macros>`,
  });

  it("multiplies boost and travel factors with forward thrust", () => {
    const engine = resolver.resolve("engine_arg_m_allround_01_mk1_macro");
    expect(engine?.attributes.thrust_forward).toBe(1500);
    expect(engine?.attributes.boost_thrust).toBe(12000);
    expect(engine?.attributes.travel_thrust).toBe(24750);
    expect(engine?.attributes.travel_charge).toBe(12);
    expect(engine?.attributes.size).toBe("medium");
  });

  it("takes thruster sizes from the thruster connection", () => {
    expect(resolver.resolve("thruster_gen_s_allround_01_mk1_macro")?.attributes.size).toBe("small");
  });

  it("leaves generic engines without a size", () => {
    expect(resolver.resolve("engine_generic_macro")?.attributes.size).toBeNull();
  });
});

// ── Weapons ─────────────────────────────────────────────────

describe("weapon derivations", () => {
  const resolver = resolverFor({
    "assets/props/weaponsystems/standard/weapon_gen_m_laser_01.xml": `<components>
      <component name="weapon_gen_m_laser_01" class="weapon">
        <connections><connection name="con_shot" tags="weapon medium"/></connections>
      </component>
    </components>`,
    "assets/fx/weaponfx/macros/bullets.xml": `<macros>
      <macro name="bullet_gen_m_laser_01_mk1_macro" class="bullet">
        <properties>
          <bullet speed="500" lifetime="4" amount="3"/>
          <damage hull="10" shield="20"/>
        </properties>
      </macro>
      <macro name="bullet_gen_plain_macro" class="bullet">
        <properties>
          <bullet speed="100" lifetime="2" range="50"/>
          <damage value="7"/>
          <reload rate="0.5"/>
        </properties>
      </macro>
    </macros>`,
    "assets/props/weaponsystems/standard/macros/weapons.xml": `<macros>
      <macro name="weapon_gen_m_laser_01_mk1_macro" class="weapon">
        <component ref="weapon_gen_m_laser_01"/>
        <properties>
          <bullet class="bullet_gen_m_laser_01_mk1_macro"/>
          <reload rate="2"/>
        </properties>
      </macro>
      <macro name="weapon_gen_plain_macro" class="weapon">
        <properties><bullet class="bullet_gen_plain_macro"/></properties>
      </macro>
      <macro name="weapon_gen_norate_macro" class="weapon">
        <properties><bullet class="bullet_gen_m_laser_01_mk1_macro"/></properties>
      </macro>
    </macros>`,
  });

  it("derives bullet stats and damage per second", () => {
    const weapon = resolver.resolve("weapon_gen_m_laser_01_mk1_macro");
    expect(weapon?.attributes).toMatchObject({
      size: "medium",
      bullet_class: "bullet_gen_m_laser_01_mk1_macro",
      bullet_speed: 500,
      bullet_range: 2000,
      bullet_dmg_hull: 10,
      bullet_dmg_shields: 20,
      dps_hull: 60,
      dps_shield: 120,
    });
  });

  it("uses the bullet's reload rate and single damage value when present", () => {
    const weapon = resolver.resolve("weapon_gen_plain_macro");
    expect(weapon?.attributes).toMatchObject({
      size: null,
      bullet_range: 50,
      bullet_dmg_hull: 7,
      bullet_dmg_shields: 7,
      dps_hull: 3.5,
      dps_shield: 3.5,
    });
  });

  it("leaves damage per second empty without a fire rate", () => {
    const weapon = resolver.resolve("weapon_gen_norate_macro");
    expect(weapon?.attributes.dps_hull).toBeNull();
    expect(weapon?.attributes.dps_shield).toBeNull();
  });
});

// ── Ships ───────────────────────────────────────────────────

describe("ship derivations", () => {
  const resolver = resolverFor({
    "assets/units/size_s/ship_test_s.xml": `<components>
      <component name="ship_test_s" class="ship_s">
        <connections>
          <connection name="con_engine_01" tags="engine small"/>
          <connection name="con_engine_02" tags="engine small"/>
          <connection name="con_shield_01" tags="shield small"/>
          <connection name="con_weapon_01" tags="weapon medium"/>
          <connection name="con_turret_01" tags="turret medium"/>
          <connection name="con_cm" tags="countermeasures"/>
        </connections>
      </component>
    </components>`,
    "assets/props/storagemodules/macros/storage.xml": `<macros>
      <macro name="storage_test_a_macro" class="storage">
        <properties><cargo max="300" tags="container"/></properties>
      </macro>
      <macro name="storage_test_b_macro" class="storage">
        <properties><cargo max="200" tags="solid container"/></properties>
      </macro>
    </macros>`,
    "assets/props/dockingbays/macros/docks.xml": `<macros>
      <macro name="dockingbay_arg_s_01_macro" class="dockingbay">
        <properties><docksize tags="dock_s"/><dock capacity="2"/></properties>
      </macro>
      <macro name="launchtube_arg_s_01_macro" class="dockingbay">
        <properties><docksize tags="dock_s"/></properties>
      </macro>
      <macro name="shipstorage_arg_m_01_macro" class="dockingbay">
        <properties><docksize tags="dock_m"/><dock capacity="4" storage="1"/></properties>
      </macro>
      <macro name="dockarea_test_macro" class="dockarea">
        <connections>
          <connection ref="con_storage"><macro ref="shipstorage_arg_m_01_macro" connection="space"/></connection>
        </connections>
      </macro>
    </macros>`,
    "assets/units/size_s/macros/ship_test_s_macro.xml": `<macros>
      <macro name="ship_test_s_macro" class="ship_s">
        <component ref="ship_test_s"/>
        <properties>
          <identification name="{20101,1}"/>
          <hull max="3000"/>
          <purpose primary="fight"/>
          <people capacity="2"/>
        </properties>
        <connections>
          <connection ref="con_storage_a"><macro ref="storage_test_a_macro" connection="ShipConnection"/></connection>
          <connection ref="con_storage_b"><macro ref="storage_test_b_macro" connection="ShipConnection"/></connection>
          <connection ref="con_dock"><macro ref="dockingbay_arg_s_01_macro" connection="ShipConnection"/></connection>
          <connection ref="con_tube"><macro ref="launchtube_arg_s_01_macro" connection="ShipConnection"/></connection>
          <connection ref="con_dockarea"><macro ref="dockarea_test_macro" connection="ShipConnection"/></connection>
        </connections>
      </macro>
    </macros>`,
  });
  const ship = resolver.resolve("ship_test_s_macro");

  it("counts component slots by tag", () => {
    expect(ship?.attributes).toMatchObject({
      class: "s",
      hull: 3000,
      purpose: "fight",
      people: 2,
      num_engines: 2,
      num_shields: 1,
      num_weapons: 1,
      num_turrets: 1,
      num_countermeasures: 1,
    });
    expect(ship?.subrecords.engine_slots).toEqual([
      { slot: "con_engine_01", size: "small", tags: ["engine", "small"] },
      { slot: "con_engine_02", size: "small", tags: ["engine", "small"] },
    ]);
    expect(ship?.subrecords.turret_slots).toEqual([{ slot: "con_turret_01", size: "medium", tags: ["turret", "medium"] }]);
  });

  it("sums storage over every storage module", () => {
    expect(ship?.attributes.cargobay).toBe(500);
    expect(ship?.attributes.storage).toEqual(["container", "solid"]);
  });

  it("counts docks, launch tubes and ship storage through nested connections", () => {
    expect(ship?.attributes).toMatchObject({
      s_docks: 2,
      m_docks: 0,
      launchtubes_s: 1,
      launchtubes_m: 0,
      shipstorage_s: 0,
      shipstorage_m: 4,
      drone_storage: 0,
    });
    expect(ship?.subrecords.dockingbays?.map((bay) => bay.macro)).toEqual([
      "dockingbay_arg_s_01_macro",
      "launchtube_arg_s_01_macro",
      "shipstorage_arg_m_01_macro",
    ]);
  });
});

// ── Wares ───────────────────────────────────────────────────

describe("ware derivations", () => {
  const resolver = resolverFor({
    "libraries/wares.xml": `<wares>
      <ware id="refinedmetals" name="{20201,401}" transport="container" volume="14" tags="container economy">
        <price min="120" average="160" max="200"/>
        <production time="300" amount="100" method="default" name="{20206,101}">
          <primary>
            <ware ware="energycells" amount="50"/>
            <ware ware="ore" amount="20"/>
          </primary>
        </production>
        <production time="200" amount="100" method="teladi" name="{20206,401}">
          <primary>
            <ware ware="energycells" amount="40"/>
          </primary>
        </production>
        <owner faction="argon"/>
        <owner faction="teladi"/>
      </ware>
    </wares>`,
  });
  const ware = resolver.resolve("refinedmetals", "ware");

  it("maps ware attributes", () => {
    expect(ware?.kind).toBe("ware");
    expect(ware?.attributes).toMatchObject({
      name: "{20201,401}",
      group: "container",
      volume: 14,
      tags: ["container", "economy"],
      illegal: [],
      price_min: 120,
      price_avg: 160,
      price_max: 200,
      licence: "",
      owners: ["argon", "teladi"],
    });
  });

  it("splits production methods with their consumption", () => {
    expect(ware?.subrecords.production).toEqual([
      { method: "default", name: "{20206,101}", time: 300, amount: 100, consumption: { energycells: 50, ore: 20 } },
      { method: "teladi", name: "{20206,401}", time: 200, amount: 100, consumption: { energycells: 40 } },
    ]);
  });
});
