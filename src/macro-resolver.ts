/**
 * MacroResolver — turns DefinitionNodes into flat, exportable records.
 *
 * Resolution happens in three steps:
 *   1. inheritance: properties overlaid along the `extends` chain, child wins
 *   2. connections: referenced macros resolved and embedded per role
 *   3. attributes: per-kind coercion, then derived values
 *
 * Inheritance is walked with a loop, so chain length never grows the stack.
 * Every node's inheritance result (or its cycle failure) is memoized, and so
 * is every record whose connection tree was not cut short by a connection
 * cycle. A cut record depends on where the walk entered the cycle, so it is
 * rebuilt from its own root each time it is asked for; the output never
 * depends on resolution order. One resolver instance is one memo partition.
 */
import { type DefinitionGraph } from "./definition-graph.js";
import type { ConnectionRef, DefinitionNamespace, DefinitionNode, PropertyBag } from "./definition-parser.js";
import { type Diagnostic, InheritanceCycleError, dedupeDiagnostics } from "./errors.js";
import { DERIVATIONS, type Derivation, PROPERTY_REFERENCES } from "./kind-derivations.js";
import { EXPORTED_KINDS } from "./object-classes.js";
import {
  type AttributeMap,
  type AttributeValue,
  type ConnectionSlot,
  type KindTable,
  defaultKindTable,
  kindFamily,
} from "./object-kinds.js";
import logger from "./utils/logger.js";

export interface ResolvedRecord {
  readonly id: string;
  readonly namespace: DefinitionNamespace;
  readonly kind: string;
  readonly source: string;
  readonly attributes: Readonly<AttributeMap>;
  readonly connections: readonly ConnectionSlot[];
  readonly subrecords: Readonly<Record<string, readonly Readonly<AttributeMap>[]>>;
  readonly diagnostics: readonly Diagnostic[];
}

export interface ResolutionResult {
  records: ResolvedRecord[];
  diagnostics: Diagnostic[];
  failures: InheritanceCycleError[];
}

export interface MacroResolverOptions {
  kindTable?: KindTable;
  derivations?: Readonly<Record<string, Derivation>>;
  propertyReferences?: Readonly<Record<string, readonly string[]>>;
  /** Kinds embedded as a summary reference instead of a nested record */
  summaryKinds?: ReadonlySet<string>;
}

interface InheritedNode {
  readonly node: DefinitionNode;
  readonly kind: string | null;
  readonly component: string | null;
  readonly properties: PropertyBag;
  readonly connections: readonly ConnectionRef[];
  readonly diagnostics: readonly Diagnostic[];
}

function nodeKey(node: DefinitionNode): string {
  return `${node.namespace}:${node.id}`;
}

/** Child connections replace the parent's connections of the same role */
export function mergeConnections(parent: readonly ConnectionRef[], own: readonly ConnectionRef[]): readonly ConnectionRef[] {
  if (!own.length) return parent;
  if (!parent.length) return own;

  const ownRoles = new Set(own.map((c) => c.role));
  const replaced = new Set<string>();
  const merged: ConnectionRef[] = [];
  for (const conn of parent) {
    if (!ownRoles.has(conn.role)) merged.push(conn);
    else if (!replaced.has(conn.role)) {
      merged.push(...own.filter((c) => c.role === conn.role));
      replaced.add(conn.role);
    }
  }
  for (const conn of own) {
    if (!replaced.has(conn.role)) merged.push(conn);
  }
  return merged;
}

function freezeValue(value: AttributeValue): AttributeValue {
  return value !== null && typeof value === "object" ? Object.freeze(value) : value;
}

function freezeAttributes(map: AttributeMap): Readonly<AttributeMap> {
  for (const value of Object.values(map)) freezeValue(value);
  return Object.freeze(map);
}

const EMPTY_SLOTS: readonly ConnectionSlot[] = Object.freeze([]);

export class MacroResolver {
  private inherited = new Map<string, InheritedNode | InheritanceCycleError>();
  private records = new Map<string, ResolvedRecord>();
  private resolving = new Set<string>();
  /** Records built with a connection cycle cut somewhere below them, never memoized */
  private truncated = new WeakSet<ResolvedRecord>();
  private sessionDiagnostics: Diagnostic[] = [];

  private readonly kindTable: KindTable;
  private readonly derivations: Readonly<Record<string, Derivation>>;
  private readonly propertyReferences: Readonly<Record<string, readonly string[]>>;
  private readonly summaryKinds: ReadonlySet<string>;

  constructor(
    private readonly graph: DefinitionGraph,
    options: MacroResolverOptions = {},
  ) {
    this.kindTable = options.kindTable ?? defaultKindTable();
    this.derivations = options.derivations ?? DERIVATIONS;
    this.propertyReferences = options.propertyReferences ?? PROPERTY_REFERENCES;
    this.summaryKinds = options.summaryKinds ?? EXPORTED_KINDS;
  }

  /** Every diagnostic reported by this resolver so far */
  get diagnostics(): readonly Diagnostic[] {
    return this.sessionDiagnostics;
  }

  private report(diagnostic: Diagnostic): Diagnostic {
    this.sessionDiagnostics.push(diagnostic);
    logger.debug(`${diagnostic.code}: ${diagnostic.message}`, { module: "resolver" });
    return diagnostic;
  }

  // ── Inheritance ──

  /**
   * Overlay a node on its ancestors. Throws InheritanceCycleError when the
   * node is part of, or inherits from, an `extends` cycle.
   */
  private inherit(start: DefinitionNode): InheritedNode {
    const memo = this.inherited.get(nodeKey(start));
    if (memo instanceof InheritanceCycleError) throw memo;
    if (memo) return memo;

    const chain: DefinitionNode[] = [];
    const position = new Map<string, number>();
    let base: InheritedNode | null = null;
    let missingParent: string | null = null;
    let cursor: DefinitionNode | undefined = start;

    while (cursor) {
      const key = nodeKey(cursor);
      const cached = this.inherited.get(key);
      if (cached instanceof InheritanceCycleError) throw this.failChain(chain, cached.cycle, chain.length);
      if (cached) {
        base = cached;
        break;
      }
      const seenAt = position.get(key);
      if (seenAt !== undefined) {
        throw this.failChain(chain, [...chain.slice(seenAt).map((n) => n.id), cursor.id], seenAt);
      }
      position.set(key, chain.length);
      chain.push(cursor);

      if (!cursor.extends) break;
      const parent = this.graph.get(cursor.namespace, cursor.extends);
      if (!parent) {
        missingParent = cursor.extends;
        break;
      }
      cursor = parent;
    }

    // Build top-down, from the oldest ancestor not yet memoized
    for (let i = chain.length - 1; i >= 0; i--) {
      const node = chain[i];
      const properties = new Map(base?.properties ?? []);
      for (const [key, value] of node.properties) properties.set(key, value);

      const diagnostics = [...(base?.diagnostics ?? [])];
      if (missingParent && i === chain.length - 1) {
        diagnostics.push(
          this.report({
            code: "UnresolvedReference",
            severity: "warning",
            objectId: node.id,
            reference: missingParent,
            path: node.source,
            message: `${node.id} extends unknown ${node.namespace} ${missingParent}`,
          }),
        );
      }

      const inherited: InheritedNode = {
        node,
        kind: node.kind ?? base?.kind ?? null,
        component: node.component ?? base?.component ?? null,
        properties,
        connections: mergeConnections(base?.connections ?? [], node.connections),
        diagnostics,
      };
      this.inherited.set(nodeKey(node), inherited);
      base = inherited;
    }

    if (!base) throw new Error(`No inheritance result for ${start.id}`);
    return base;
  }

  /**
   * Memoize the cycle failure for every node walked; nodes from `cycleStart`
   * on are the loop itself. Returns the failure of the first node.
   */
  private failChain(chain: readonly DefinitionNode[], cycle: readonly string[], cycleStart: number): InheritanceCycleError {
    const errors = chain.map((node, i) => new InheritanceCycleError(node.id, cycle, i >= cycleStart));
    chain.forEach((node, i) => this.inherited.set(nodeKey(node), errors[i]));
    logger.warn(errors[0].message, { module: "resolver" });
    return errors[0];
  }

  // ── Records ──

  /** Resolve one identifier; null (with a diagnostic) when absent or of unknown kind */
  resolve(id: string, namespace: DefinitionNamespace = "macro"): ResolvedRecord | null {
    const node = this.graph.get(namespace, id);
    if (!node) {
      this.report({ code: "UnresolvedReference", severity: "warning", reference: id, message: `Unknown ${namespace} ${id}` });
      return null;
    }
    const inherited = this.inherit(node);
    if (!inherited.kind || !this.kindTable.has(inherited.kind)) {
      this.reportUnknownKind(node, inherited.kind);
      return null;
    }
    return this.build(node, inherited, inherited.kind);
  }

  /** Resolve every node of the namespace whose resolved kind is in `kinds` */
  resolveKind(kinds: Iterable<string>, namespace: DefinitionNamespace = "macro"): ResolutionResult {
    const wanted = new Set(kinds);
    const firstDiagnostic = this.sessionDiagnostics.length;
    const records: ResolvedRecord[] = [];
    const failures: InheritanceCycleError[] = [];

    for (const node of this.graph.inNamespace(namespace)) {
      let inherited: InheritedNode;
      try {
        inherited = this.inherit(node);
      } catch (e) {
        if (e instanceof InheritanceCycleError) {
          // a declared kind tells whether the failure belongs to this request
          if (!node.kind || wanted.has(node.kind)) failures.push(e);
          continue;
        }
        throw e;
      }

      const kind = inherited.kind;
      if (!kind) {
        this.reportUnknownKind(node, null);
        continue;
      }
      if (!wanted.has(kind)) continue;
      if (!this.kindTable.has(kind)) {
        this.reportUnknownKind(node, kind);
        continue;
      }
      records.push(this.build(node, inherited, kind));
    }

    records.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return {
      records,
      diagnostics: dedupeDiagnostics(this.sessionDiagnostics.slice(firstDiagnostic)),
      failures,
    };
  }

  private reportUnknownKind(node: DefinitionNode, kind: string | null): Diagnostic {
    return this.report({
      code: "UnknownKind",
      severity: "warning",
      objectId: node.id,
      path: node.source,
      message: kind ? `${node.id} has unknown kind ${kind}` : `${node.id} has no class in its extends chain`,
    });
  }

  private build(node: DefinitionNode, inherited: InheritedNode, kind: string): ResolvedRecord {
    const key = nodeKey(node);
    const memo = this.records.get(key);
    if (memo) return memo;

    this.resolving.add(key);
    try {
      const diagnostics: Diagnostic[] = [...inherited.diagnostics];
      const family = kindFamily(kind);

      const { slots: connections, truncated } = this.resolveConnections(node, this.connectionsOf(inherited, family), diagnostics);
      const attributes = this.kindTable.coerce(kind, inherited.properties, node.id);
      const subrecords: Record<string, AttributeMap[]> = {};

      this.derivations[family]?.({
        id: node.id,
        kind,
        family,
        raw: inherited.properties,
        attributes,
        component: this.componentOf(node, inherited, diagnostics),
        connections,
        subrecords,
      });

      const record: ResolvedRecord = Object.freeze({
        id: node.id,
        namespace: node.namespace,
        kind,
        source: node.source,
        attributes: freezeAttributes(attributes),
        connections,
        subrecords: Object.freeze(
          Object.fromEntries(Object.entries(subrecords).map(([name, rows]) => [name, Object.freeze(rows.map(freezeAttributes))])),
        ),
        diagnostics: Object.freeze(diagnostics),
      });
      if (truncated) this.truncated.add(record);
      else this.records.set(key, record);
      return record;
    } finally {
      this.resolving.delete(key);
    }
  }

  /** Declared connections plus property references such as bullet.class */
  private connectionsOf(inherited: InheritedNode, family: string): readonly ConnectionRef[] {
    const references = this.propertyReferences[family] ?? [];
    const extra: ConnectionRef[] = [];
    for (const property of references) {
      const target = inherited.properties.get(property)?.trim();
      if (target) extra.push({ role: property.split(".")[0], target, connection: null, tags: [] });
    }
    return extra.length ? [...inherited.connections, ...extra] : inherited.connections;
  }

  private componentOf(node: DefinitionNode, inherited: InheritedNode, diagnostics: Diagnostic[]) {
    if (!inherited.component) return null;
    const component = this.graph.get("component", inherited.component);
    if (!component) {
      diagnostics.push(
        this.report({
          code: "UnresolvedReference",
          severity: "warning",
          objectId: node.id,
          reference: inherited.component,
          path: node.source,
          message: `${node.id} uses unknown component ${inherited.component}`,
        }),
      );
      return null;
    }
    try {
      return { id: component.id, connections: this.inherit(component).connections };
    } catch (e) {
      if (!(e instanceof InheritanceCycleError)) throw e;
      diagnostics.push(
        this.report({
          code: "UnresolvedReference",
          severity: "error",
          objectId: node.id,
          reference: component.id,
          message: `${node.id} uses component ${component.id}: ${e.message}`,
        }),
      );
      return null;
    }
  }

  /** Slots for each connection; `truncated` when a cycle was cut here or in an embedded record */
  private resolveConnections(
    node: DefinitionNode,
    refs: readonly ConnectionRef[],
    diagnostics: Diagnostic[],
  ): { slots: readonly ConnectionSlot[]; truncated: boolean } {
    if (!refs.length) return { slots: EMPTY_SLOTS, truncated: false };
    const placeholder = (ref: ConnectionRef, kind: string | null = null): ConnectionSlot =>
      Object.freeze({ role: ref.role, target: ref.target, kind, embed: null, attributes: null, connections: EMPTY_SLOTS });
    const problem = (code: Diagnostic["code"], ref: ConnectionRef, message: string) =>
      diagnostics.push(
        this.report({ code, severity: "warning", objectId: node.id, reference: ref.target ?? undefined, path: node.source, message }),
      );

    const slots: ConnectionSlot[] = [];
    let truncated = false;
    for (const ref of refs) {
      if (!ref.target) {
        slots.push(placeholder(ref));
        continue;
      }
      const target = this.graph.get("macro", ref.target);
      if (!target) {
        problem("UnresolvedReference", ref, `${node.id}: connection ${ref.role} references unknown macro ${ref.target}`);
        slots.push(placeholder(ref));
        continue;
      }
      if (this.resolving.has(nodeKey(target))) {
        problem("ConnectionCycle", ref, `${node.id}: connection ${ref.role} leads back to ${ref.target}`);
        slots.push(placeholder(ref));
        truncated = true;
        continue;
      }

      let inherited: InheritedNode;
      try {
        inherited = this.inherit(target);
      } catch (e) {
        if (!(e instanceof InheritanceCycleError)) throw e;
        problem("UnresolvedReference", ref, `${node.id}: connection ${ref.role} target ${ref.target} cannot be resolved: ${e.message}`);
        slots.push(placeholder(ref));
        continue;
      }
      if (!inherited.kind || !this.kindTable.has(inherited.kind)) {
        problem("UnknownKind", ref, `${node.id}: connection ${ref.role} target ${ref.target} has ${inherited.kind ? `unknown kind ${inherited.kind}` : "no kind"}`);
        slots.push(placeholder(ref, inherited.kind));
        continue;
      }

      const record = this.build(target, inherited, inherited.kind);
      if (this.truncated.has(record)) truncated = true;
      if (this.summaryKinds.has(record.kind)) {
        slots.push(
          Object.freeze({
            role: ref.role,
            target: record.id,
            kind: record.kind,
            embed: "summary",
            attributes: Object.freeze({
              id: record.id,
              kind: record.kind,
              name: record.attributes.name ?? null,
              size: record.attributes.size ?? null,
            }),
            connections: EMPTY_SLOTS,
          }),
        );
      } else {
        slots.push(
          Object.freeze({
            role: ref.role,
            target: record.id,
            kind: record.kind,
            embed: "nested",
            attributes: record.attributes,
            connections: record.connections,
          }),
        );
      }
    }
    return { slots: Object.freeze(slots), truncated };
  }
}
