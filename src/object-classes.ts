/**
 * Exportable object classes: where their definitions live, which kinds they
 * contain and which columns the tabular export carries.
 */
import type { DefinitionNamespace } from "./definition-parser.js";
import type { GameFileSource } from "./game-files.js";
import { normalizeGameDir, normalizeGamePath } from "./utils/game-path.js";

export const OBJECT_CLASSES = ["engines", "shields", "ships", "weapons", "missilelaunchers", "wares"] as const;
export type ObjectClass = (typeof OBJECT_CLASSES)[number];

export interface DefinitionLocation {
  /** Logical directory, relative to the game or extension root */
  dir: string;
  /** File name prefixes to load, all files when empty */
  prefixes: readonly string[];
}

export interface ObjectClassDefinition {
  name: ObjectClass;
  namespace: DefinitionNamespace;
  /** Record kinds exported for this class */
  kinds: readonly string[];
  /** Documents loaded for this class (equipment parts included) */
  locations: readonly DefinitionLocation[];
  /** Single documents loaded for this class */
  files?: readonly string[];
  columns: readonly string[];
}

const SHIP_SIZES = ["xs", "s", "m", "l", "xl"] as const;
const WEAPON_DIRS = ["capital", "heavy", "mining", "standard", "spacesuit", "energy", "xref_parts"];
const LAUNCHER_DIRS = ["dumbfire", "guided", "torpedo", "spacesuit"];

const EQUIPMENT_COLUMNS = ["name", "makerrace", "size", "hull", "hull_integrated"];

export const OBJECT_CLASS_DEFINITIONS: Readonly<Record<ObjectClass, ObjectClassDefinition>> = {
  engines: {
    name: "engines",
    namespace: "macro",
    kinds: ["engine"],
    locations: [{ dir: "assets/props/engines/macros", prefixes: ["engine_", "thruster_"] }],
    columns: [
      ...EQUIPMENT_COLUMNS,
      "thrust_forward",
      "thrust_reverse",
      "thrust_strafe",
      "thrust_pitch",
      "thrust_yaw",
      "thrust_roll",
      "boost_thrust",
      "boost_duration",
      "travel_thrust",
      "travel_charge",
    ],
  },
  shields: {
    name: "shields",
    namespace: "macro",
    kinds: ["shieldgenerator"],
    locations: [{ dir: "assets/props/surfaceelements/macros", prefixes: ["shield_"] }],
    columns: [...EQUIPMENT_COLUMNS, "capacity", "recharge_rate", "recharge_delay"],
  },
  ships: {
    name: "ships",
    namespace: "macro",
    kinds: SHIP_SIZES.map((size) => `ship_${size}`),
    locations: SHIP_SIZES.map((size) => ({ dir: `assets/units/size_${size}/macros`, prefixes: [] })),
    columns: [
      "name",
      "class",
      "type",
      "purpose",
      "hull",
      "people",
      "cargobay",
      "storage",
      "missile_storage",
      "drone_storage",
      "num_engines",
      "num_shields",
      "num_weapons",
      "num_turrets",
      "num_countermeasures",
      "s_docks",
      "m_docks",
      "shipstorage_s",
      "shipstorage_m",
      "launchtubes_s",
      "launchtubes_m",
      "mass",
      "drag_forward",
      "drag_reverse",
      "drag_horizontal",
      "drag_vertical",
      "drag_pitch",
      "drag_yaw",
      "drag_roll",
      "inertia_pitch",
      "inertia_yaw",
      "inertia_roll",
    ],
  },
  weapons: {
    name: "weapons",
    namespace: "macro",
    kinds: ["weapon", "turret"],
    locations: [
      ...WEAPON_DIRS.map((dir) => ({
        dir: `assets/props/weaponsystems/${dir}/macros`,
        prefixes: ["weapon_", "turret_", "spacesuit_gen_laser_", "spacesuit_gen_repairweapon_"],
      })),
      { dir: "assets/fx/weaponfx/macros", prefixes: ["bullet_"] },
    ],
    columns: [
      ...EQUIPMENT_COLUMNS,
      "bullet_class",
      "bullet_speed",
      "bullet_range",
      "bullet_dmg_hull",
      "bullet_dmg_shields",
      "dps_hull",
      "dps_shield",
      "reload_rate",
      "heat_overheat",
      "rotation_speed",
    ],
  },
  missilelaunchers: {
    name: "missilelaunchers",
    namespace: "macro",
    kinds: ["missilelauncher", "missileturret", "bomblauncher"],
    locations: [
      ...LAUNCHER_DIRS.map((dir) => ({
        dir: `assets/props/weaponsystems/${dir}/macros`,
        prefixes: ["weapon_", "turret_", "spacesuit_gen_bomblauncher_"],
      })),
      { dir: "assets/props/weaponsystems/missile/macros", prefixes: ["missile_"] },
      { dir: "assets/fx/weaponfx/macros", prefixes: ["bomb_"] },
    ],
    columns: [...EQUIPMENT_COLUMNS, "capacity", "ammunition", "rotation_speed", "bullet_class"],
  },
  wares: {
    name: "wares",
    namespace: "ware",
    kinds: ["ware"],
    locations: [],
    files: ["libraries/wares.xml"],
    columns: ["name", "factoryname", "group", "tags", "volume", "price_min", "price_max"],
  },
};

export function isObjectClass(name: string): name is ObjectClass {
  return (OBJECT_CLASSES as readonly string[]).includes(name);
}

/** Kinds exported as top-level rows; connections to them embed a summary only */
export const EXPORTED_KINDS: ReadonlySet<string> = new Set(
  Object.values(OBJECT_CLASS_DEFINITIONS).flatMap((definition) => definition.kinds),
);

/**
 * Logical paths of the documents an object class is built from,
 * for the base game ("") or an extension name.
 */
export async function collectDefinitionPaths(
  files: GameFileSource,
  definition: ObjectClassDefinition,
  extension?: string,
): Promise<string[]> {
  const root = extension ? `extensions/${extension}/` : "";
  const paths: string[] = [];

  for (const location of definition.locations) {
    for (const entry of await files.listFiles(normalizeGameDir(root + location.dir))) {
      if (!entry.name.endsWith(".xml")) continue;
      if (location.prefixes.length && !location.prefixes.some((prefix) => entry.name.startsWith(prefix))) continue;
      paths.push(entry.path);
    }
  }
  for (const file of definition.files ?? []) {
    if (await files.exists(root + file)) paths.push(normalizeGamePath(root + file));
  }
  return paths;
}
