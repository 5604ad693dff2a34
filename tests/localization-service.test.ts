/**
 * Tests for LocalizationService placeholder resolution
 */
import { describe, expect, it } from "vitest";
import { ArchiveOverlay } from "../src/archive-overlay.js";
import { LocalizationService, languageFileFor, localizeRecords } from "../src/localization-service.js";
import type { ResolvedRecord } from "../src/macro-resolver.js";
import { memoryLayer } from "./helpers.js";

const ENGLISH = `<?xml version="1.0" encoding="utf-8"?>
<language id="44">
  <page id="20101" title="Ships">
    <t id="30302">Behemoth {20111, 1101}</t>
    <t id="30303">Nova (internal note) Vanguard</t>
    <t id="30304">Price \\(approx.\\)</t>
    <t id="30305">  padded  </t>
  </page>
  <page id="20111">
    <t id="1101">Vanguard</t>
    <t id="1102">{20111,1103}</t>
    <t id="1103">{20111,1102}</t>
  </page>
</language>`;

function english(): LocalizationService {
  const localization = new LocalizationService();
  localization.loadLanguageFile("en", ENGLISH, "t/0001-l044.xml");
  return localization;
}

describe("languageFileFor", () => {
  it("maps aliases to language files", () => {
    expect(languageFileFor("en")).toBe("t/0001-l044.xml");
    expect(languageFileFor("English")).toBe("t/0001-l044.xml");
    expect(languageFileFor("deutsch")).toBe("t/0001-l049.xml");
    expect(languageFileFor("zh-tw")).toBe("t/0001-l088.xml");
  });

  it("returns undefined for unknown languages", () => {
    expect(languageFileFor("klingon")).toBeUndefined();
  });
});

describe("LocalizationService.resolve", () => {
  it("counts loaded entries", () => {
    const localization = english();
    expect(localization.isLoaded).toBe(true);
    expect(localization.entryCount).toBe(7);
  });

  it("substitutes nested placeholders until the text is stable", () => {
    expect(english().resolve("This ship is {20101,30302}")).toBe("This ship is Behemoth Vanguard");
  });

  it("tolerates whitespace inside placeholders", () => {
    expect(english().resolve("{ 20111 ,1101 }")).toBe("Vanguard");
  });

  it("removes comments and then unescapes parentheses", () => {
    expect(english().resolve("{20101,30303}")).toBe("Nova  Vanguard");
    expect(english().resolve("{20101,30304}")).toBe("Price (approx.)");
  });

  it("strips surrounding whitespace unless told not to", () => {
    expect(english().resolve("{20101,30305}")).toBe("padded");
    expect(english().resolve("{20101,30305}", "en", false)).toBe("  padded  ");
  });

  it("keeps unknown placeholders and lists them", () => {
    const localization = english();
    expect(localization.resolve("Name: {99999,1}")).toBe("Name: {99999,1}");
    expect(localization.resolve("Again {99999,1}")).toBe("Again {99999,1}");
    expect(localization.unresolved).toEqual(["{99999,1}"]);
  });

  it("stops on placeholders that expand forever", () => {
    const text = english().resolve("{20111,1102}");
    expect(["{20111,1102}", "{20111,1103}"]).toContain(text);
  });

  it("returns an empty template unchanged", () => {
    expect(english().resolve("")).toBe("");
  });

  it("refuses a language that was never loaded", () => {
    expect(() => english().resolve("{20111,1101}", "de")).toThrow('Language "de" is not loaded');
  });
});

describe("LocalizationService.loadLanguage", () => {
  it("reads the language file for an alias from the game files", async () => {
    const files = new ArchiveOverlay([memoryLayer(1, { "t/0001-l044.xml": ENGLISH })]);
    const localization = new LocalizationService();
    expect(await localization.loadLanguage(files, "english")).toBe(7);
    expect(localization.resolve("{20111,1101}")).toBe("Vanguard");
  });

  it("rejects unknown languages", async () => {
    const files = new ArchiveOverlay([memoryLayer(1, {})]);
    await expect(new LocalizationService().loadLanguage(files, "klingon")).rejects.toThrow('Unknown language "klingon"');
  });
});

describe("localizeRecords", () => {
  const record: ResolvedRecord = {
    id: "ship_test_macro",
    namespace: "macro",
    kind: "ship_s",
    source: "test.xml",
    attributes: { name: "{20111,1101}", hull: 100, storage: ["{20111,1101}"] },
    connections: [
      {
        role: "con_engine",
        target: "engine_a",
        kind: "engine",
        embed: "summary",
        attributes: { id: "engine_a", name: "{20101,30302}" },
        connections: [],
      },
    ],
    subrecords: { production: [{ name: "{20111,1101}", time: 10 }] },
    diagnostics: [],
  };

  it("resolves string attributes in records, connections and subrecords", () => {
    const [localized] = localizeRecords([record], english());
    expect(localized.attributes).toEqual({ name: "Vanguard", hull: 100, storage: ["{20111,1101}"] });
    expect(localized.connections[0].attributes).toEqual({ id: "engine_a", name: "Behemoth Vanguard" });
    expect(localized.subrecords.production).toEqual([{ name: "Vanguard", time: 10 }]);
    expect(Object.isFrozen(localized)).toBe(true);
    expect(record.attributes.name).toBe("{20111,1101}");
  });
});
