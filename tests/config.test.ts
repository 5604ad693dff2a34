/**
 * Tests for environment configuration and CLI argument parsing
 */
import { describe, expect, it } from "vitest";
import { UsageError, parseArgs } from "../src/cli-args.js";
import { OBJECT_CLASSES } from "../src/object-classes.js";
import { dbConfigFrom, loadConfig } from "../src/utils/config.js";

// ── loadConfig ──────────────────────────────────────────────

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      GAME_ROOT: ".",
      FILE_LOADER: "cat",
      MAX_LAYERS: 99,
      LANGUAGE: "en",
      EXPORT_DIR: ".",
      EXPORT_FORMAT: "csv",
      ON_DOCUMENT_ERROR: "abort",
      VERIFY_CHECKSUMS: true,
      DB_HOST: "localhost",
      DB_PORT: 3306,
    });
  });

  it("coerces numbers and flags and ignores blank values", () => {
    const config = loadConfig({ MAX_LAYERS: "3", VERIFY_CHECKSUMS: "no", DB_PORT: "3307", LANGUAGE: "  ", EXPORT_FORMAT: "yaml" });
    expect(config.MAX_LAYERS).toBe(3);
    expect(config.VERIFY_CHECKSUMS).toBe(false);
    expect(config.DB_PORT).toBe(3307);
    expect(config.LANGUAGE).toBe("en");
    expect(config.EXPORT_FORMAT).toBe("yaml");
  });

  it("rejects invalid values with the offending key", () => {
    expect(() => loadConfig({ MAX_LAYERS: "100" })).toThrow(/^Invalid configuration: MAX_LAYERS: /);
    expect(() => loadConfig({ FILE_LOADER: "zip" })).toThrow(/FILE_LOADER/);
    expect(() => loadConfig({ EXPORT_FORMAT: "xml" })).toThrow(/EXPORT_FORMAT/);
  });
});

describe("dbConfigFrom", () => {
  it("requires credentials for the mysql format", () => {
    expect(() => dbConfigFrom(loadConfig({ DB_USER: "extractor" }))).toThrow(
      "DB_USER, DB_PASSWORD, and DB_NAME environment variables are required for the mysql format.",
    );
  });

  it("builds pool options", () => {
    const config = loadConfig({ DB_HOST: "db", DB_USER: "extractor", DB_PASSWORD: "test-secret", DB_NAME: "gamedata" });
    expect(dbConfigFrom(config)).toEqual({
      host: "db",
      port: 3306,
      user: "extractor",
      password: "test-secret",
      database: "gamedata",
      waitForConnections: true,
      connectionLimit: 5,
    });
  });
});

// ── parseArgs ───────────────────────────────────────────────

describe("parseArgs", () => {
  it("exports every object class by default", () => {
    const args = parseArgs(["export"]);
    expect(args.command).toBe("export");
    expect(args.objects).toEqual([...OBJECT_CLASSES]);
  });

  it("maps flags to configuration keys", () => {
    const args = parseArgs(["-g", "/games/x4", "--file-loader", "fs", "-l", "de", "-v", "export", "ships", "Wares", "-f", "json", "-d", "out", "--skip-broken"]);
    expect(args.verbose).toBe(true);
    expect(args.objects).toEqual(["ships", "wares"]);
    expect(args.env).toEqual({
      GAME_ROOT: "/games/x4",
      FILE_LOADER: "fs",
      LANGUAGE: "de",
      EXPORT_FORMAT: "json",
      EXPORT_DIR: "out",
      ON_DOCUMENT_ERROR: "skip",
    });
  });

  it("collapses duplicates and 'all'", () => {
    expect(parseArgs(["export", "engines", "all"]).objects).toEqual([...OBJECT_CLASSES]);
    expect(parseArgs(["export", "engines", "engines"]).objects).toEqual(["engines"]);
  });

  it("collects resolve-string templates", () => {
    const args = parseArgs(["--max-layers", "2", "resolve-string", "This ship is {20101,30302}", "{1,2}"]);
    expect(args.command).toBe("resolve-string");
    expect(args.templates).toEqual(["This ship is {20101,30302}", "{1,2}"]);
    expect(args.env).toEqual({ MAX_LAYERS: "2" });
  });

  it("returns early for --help", () => {
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it("rejects invalid invocations", () => {
    expect(() => parseArgs([])).toThrow(UsageError);
    expect(() => parseArgs(["import"])).toThrow('Unknown command "import"');
    expect(() => parseArgs(["export", "stations"])).toThrow(/Unknown object class "stations"/);
    expect(() => parseArgs(["export", "--bogus"])).toThrow("Unknown option --bogus");
    expect(() => parseArgs(["-g"])).toThrow("-g requires a value");
    expect(() => parseArgs(["resolve-string"])).toThrow("resolve-string needs at least one template");
    expect(() => parseArgs(["--skip-broken", "export"])).toThrow("Unknown option --skip-broken");
  });
});
