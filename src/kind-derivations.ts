/**
 * Kind-specific derived attributes, computed once per record after the
 * inherited properties have been overlaid and coerced.
 */
import type { PropertyBag } from "./definition-parser.js";
import {
  type AttributeMap,
  type ConnectionSlot,
  type DerivationContext,
  num,
  tags,
} from "./object-kinds.js";
import logger from "./utils/logger.js";

export type Derivation = (ctx: DerivationContext) => void;

const SIZE_TAGS = new Set(["spacesuit", "extrasmall", "small", "medium", "large", "extralarge"]);

export function sizeFromTags(tagList: readonly string[]): string | null {
  return tagList.find((t) => SIZE_TAGS.has(t)) ?? null;
}

/** Size of the first component connection carrying `tag` */
export function componentSize(ctx: DerivationContext, tag: string): string | null {
  if (!ctx.component) return null;
  let size: string | null = null;
  for (const conn of ctx.component.connections) {
    if (!conn.tags.includes(tag)) continue;
    const found = sizeFromTags(conn.tags);
    if (!found) continue;
    if (!size) size = found;
    else if (found !== size) {
      logger.debug(`${ctx.component.id}: several ${tag} sizes, keeping ${size}`, { module: "kinds" });
      break;
    }
  }
  if (!size) logger.debug(`Cannot determine ${tag} size for ${ctx.component.id}`, { module: "kinds" });
  return size;
}

function numericOrNull(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Split indexed property groups back into bags:
 * production.time / production[0].time, production[1].time, …
 */
export function indexedGroups(raw: PropertyBag, prefix: string): Map<string, string>[] {
  const groups = new Map<number, Map<string, string>>();
  const escaped = prefix.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const pattern = new RegExp(`^${escaped}(?:\\[(\\d+)\\])?\\.(.+)$`);
  for (const [key, value] of raw) {
    const match = pattern.exec(key);
    if (!match) continue;
    const index = match[1] === undefined ? 0 : Number(match[1]);
    let group = groups.get(index);
    if (!group) {
      group = new Map();
      groups.set(index, group);
    }
    group.set(match[2], value);
  }
  return [...groups.entries()].sort(([a], [b]) => a - b).map(([, group]) => group);
}

// ── Equipment ────────────────────────────────────────────

const engine: Derivation = (ctx) => {
  const a = ctx.attributes;
  const forward = num(a.thrust_forward);
  // boost and travel thrust are multipliers over forward thrust
  a.boost_thrust = forward * num(a.boost_thrust_factor);
  a.travel_thrust = forward * num(a.travel_thrust_factor);

  const componentId = ctx.component?.id ?? "";
  if (componentId.startsWith("generic_")) a.size = null;
  else a.size = componentSize(ctx, componentId.startsWith("thruster_") ? "thruster" : "engine");
};

const shieldgenerator: Derivation = (ctx) => {
  ctx.attributes.size = componentSize(ctx, "shield");
};

const bullet: Derivation = (ctx) => {
  const a = ctx.attributes;
  const value = numericOrNull(ctx.raw.get("damage.value")) ?? 0;
  a.dmg_hull = typeof a.dmg_hull === "number" && a.dmg_hull !== 0 ? a.dmg_hull : value;
  a.dmg_shields = typeof a.dmg_shields === "number" && a.dmg_shields !== 0 ? a.dmg_shields : value;
  if (num(a.range) <= 0) a.range = num(a.speed) * num(a.lifetime);
};

const weapon: Derivation = (ctx) => {
  const a = ctx.attributes;
  a.size = componentSize(ctx, ctx.kind === "turret" ? "turret" : "weapon");

  const shot = ctx.connections.find((slot) => slot.role === "bullet")?.attributes;
  if (!shot) return;
  a.bullet_speed = num(shot.speed);
  a.bullet_range = num(shot.range);
  a.bullet_dmg_hull = num(shot.dmg_hull);
  a.bullet_dmg_shields = num(shot.dmg_shields);

  const rate = num(shot.reload_rate) > 0 ? num(shot.reload_rate) : num(a.reload_rate);
  const perShot = Math.max(num(shot.amount), 1);
  a.dps_hull = rate > 0 ? num(shot.dmg_hull) * perShot * rate : null;
  a.dps_shield = rate > 0 ? num(shot.dmg_shields) * perShot * rate : null;
};

const missilelauncher: Derivation = (ctx) => {
  ctx.attributes.size = componentSize(ctx, "missile");
};

const missile: Derivation = (ctx) => {
  const a = ctx.attributes;
  const value = numericOrNull(ctx.raw.get("explosiondamage.value")) ?? 0;
  a.damage_hull = typeof a.damage_hull === "number" && a.damage_hull !== 0 ? a.damage_hull : value;
  a.damage_shield = typeof a.damage_shield === "number" && a.damage_shield !== 0 ? a.damage_shield : value;
};

// ── Ships ────────────────────────────────────────────────

const SLOT_TAGS = { engine: "engine_slots", shield: "shield_slots", weapon: "weapon_slots", turret: "turret_slots" } as const;

interface ShipTotals {
  cargobay: number;
  storage: Set<string>;
  drone_storage: number;
  shipstorage_s: number;
  shipstorage_m: number;
  s_docks: number;
  m_docks: number;
  launchtubes_s: number;
  launchtubes_m: number;
}

/** Walk embedded records depth-first; the resolver guarantees the tree is acyclic */
function collectShipParts(slots: readonly ConnectionSlot[], totals: ShipTotals, bays: AttributeMap[]): void {
  for (const slot of slots) {
    const attrs = slot.attributes;
    if (attrs && slot.target) {
      if (slot.kind === "dockingbay") {
        bays.push({ macro: slot.target, ...attrs });
        const docksize = tags(attrs.docksize);
        const capacity = num(attrs.dock_capacity);
        if (num(attrs.dock_storage)) {
          if (docksize.includes("dock_xs")) totals.drone_storage += capacity;
          if (docksize.includes("dock_s")) totals.shipstorage_s += capacity;
          if (docksize.includes("dock_m")) totals.shipstorage_m += capacity;
        }
        if (slot.target.startsWith("dockingbay")) {
          if (docksize.includes("dock_s")) totals.s_docks += capacity;
          if (docksize.includes("dock_m")) totals.m_docks += capacity;
        }
        if (slot.target.startsWith("launchtube")) {
          if (docksize.includes("dock_s")) totals.launchtubes_s += capacity;
          if (docksize.includes("dock_m")) totals.launchtubes_m += capacity;
        }
      } else if (slot.kind === "storage") {
        totals.cargobay += num(attrs.cargobay);
        for (const t of tags(attrs.storage_type)) totals.storage.add(t);
      }
    }
    collectShipParts(slot.connections, totals, bays);
  }
}

const ship: Derivation = (ctx) => {
  const a = ctx.attributes;
  a.class = ctx.kind.replace(/^ship_/, "");

  const componentConnections = ctx.component?.connections ?? [];
  const count = (tag: string) => componentConnections.filter((c) => c.tags.includes(tag)).length;
  a.num_engines = count("engine");
  a.num_shields = count("shield");
  a.num_weapons = count("weapon");
  a.num_turrets = count("turret");
  a.num_countermeasures = count("countermeasures");

  for (const [tag, name] of Object.entries(SLOT_TAGS)) {
    ctx.subrecords[name] = componentConnections
      .filter((c) => c.tags.includes(tag))
      .map((c) => ({ slot: c.role, size: sizeFromTags(c.tags), tags: c.tags }));
  }

  const totals: ShipTotals = {
    cargobay: 0,
    storage: new Set(),
    drone_storage: 0,
    shipstorage_s: 0,
    shipstorage_m: 0,
    s_docks: 0,
    m_docks: 0,
    launchtubes_s: 0,
    launchtubes_m: 0,
  };
  const bays: AttributeMap[] = [];
  collectShipParts(ctx.connections, totals, bays);

  const { storage, ...counts } = totals;
  Object.assign(a, counts);
  a.storage = [...storage];
  ctx.subrecords.dockingbays = bays;
};

// ── Wares ────────────────────────────────────────────────

const ware: Derivation = (ctx) => {
  const a = ctx.attributes;
  a.owners = indexedGroups(ctx.raw, "owner")
    .map((group) => group.get("faction"))
    .filter((faction): faction is string => !!faction);

  ctx.subrecords.production = indexedGroups(ctx.raw, "production").map((group) => {
    const consumption: Record<string, number> = {};
    for (const input of indexedGroups(group, "primary.ware")) {
      const id = input.get("ware");
      if (id) consumption[id] = Math.trunc(Number(input.get("amount") ?? 0)) || 0;
    }
    return {
      method: group.get("method") ?? null,
      name: group.get("name") ?? null,
      time: numericOrNull(group.get("time")),
      amount: numericOrNull(group.get("amount")),
      consumption,
    };
  });
};

export const DERIVATIONS: Readonly<Record<string, Derivation>> = {
  engine,
  shieldgenerator,
  weapon,
  turret: weapon,
  bomblauncher: weapon,
  bullet,
  missilelauncher,
  missileturret: missilelauncher,
  missile,
  bomb: missile,
  ship,
  ware,
};

/** Raw properties that name another macro, followed like connections */
export const PROPERTY_REFERENCES: Readonly<Record<string, readonly string[]>> = {
  weapon: ["bullet.class"],
  turret: ["bullet.class"],
  bomblauncher: ["bullet.class"],
  missilelauncher: ["bullet.class"],
  missileturret: ["bullet.class"],
};
