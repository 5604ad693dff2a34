/**
 * Definition documents → DefinitionNodes.
 *
 *   <macros><macro name class extends>
 *     <component ref/>
 *     <properties>…</properties>
 *     <connections><connection ref><macro ref connection/></connection></connections>
 *   </macro></macros>
 *
 *   <components><component name class><connections><connection name tags/></connections></component></components>
 *
 *   <wares><ware id …><price …/><production …/></ware></wares>
 *
 * Property subtrees are flattened into dotted keys with raw string values:
 * <hull max="500"/> becomes hull.max = "500", repeated siblings are indexed
 * (owner[0].faction, owner[1].faction). Nothing is coerced or cross-checked
 * here; references are followed by the resolver.
 */
import { MalformedDefinitionError } from "./errors.js";
import logger from "./utils/logger.js";
import { type XmlNode, childrenByTag, firstChild, parseXml, textOf } from "./utils/xml-tree.js";

export type DefinitionNamespace = "macro" | "component" | "ware";

export interface ConnectionRef {
  /** Connection name on the owning object (macro: @ref, component: @name) */
  readonly role: string;
  /** Referenced macro identifier, null for plain component connection points */
  readonly target: string | null;
  /** Connection name on the target side */
  readonly connection: string | null;
  readonly tags: readonly string[];
}

export type PropertyBag = ReadonlyMap<string, string>;

export interface DefinitionNode {
  readonly id: string;
  readonly namespace: DefinitionNamespace;
  /** Declared class, null when it must come from a parent */
  readonly kind: string | null;
  readonly extends: string | null;
  /** Component identifier (macros only) */
  readonly component: string | null;
  readonly properties: PropertyBag;
  readonly connections: readonly ConnectionRef[];
  /** Logical path of the defining document */
  readonly source: string;
}

const ROOTS: Record<string, { element: string; namespace: DefinitionNamespace; idAttribute: string }> = {
  macros: { element: "macro", namespace: "macro", idAttribute: "name" },
  components: { element: "component", namespace: "component", idAttribute: "name" },
  wares: { element: "ware", namespace: "ware", idAttribute: "id" },
};

export function parseDefinitions(bytes: Buffer | string, source: string): DefinitionNode[] {
  const root = parseXml(bytes, source);
  const layout = ROOTS[root.tag];
  if (!layout) {
    logger.warn(`Unsupported root <${root.tag}> in ${source}, no definitions read`, { module: "definitions" });
    return [];
  }

  const nodes: DefinitionNode[] = [];
  const seen = new Set<string>();
  for (const element of childrenByTag(root, layout.element)) {
    const id = element.attributes[layout.idAttribute]?.trim();
    if (!id) {
      throw new MalformedDefinitionError(source, `<${layout.element}> without ${layout.idAttribute}`);
    }
    if (seen.has(id)) {
      throw new MalformedDefinitionError(source, `duplicate ${layout.namespace} "${id}"`);
    }
    seen.add(id);

    nodes.push(
      layout.namespace === "ware"
        ? parseWare(element, id, source)
        : parseObject(element, id, layout.namespace, source),
    );
  }
  return nodes;
}

function optionalAttribute(node: XmlNode, name: string): string | null {
  const value = node.attributes[name]?.trim();
  return value ? value : null;
}

function parseObject(element: XmlNode, id: string, namespace: DefinitionNamespace, source: string): DefinitionNode {
  const componentRefs = childrenByTag(element, "component");
  if (componentRefs.length > 1) {
    throw new MalformedDefinitionError(source, `${namespace} "${id}" declares ${componentRefs.length} components`);
  }
  const propertyBlocks = childrenByTag(element, "properties");
  if (propertyBlocks.length > 1) {
    throw new MalformedDefinitionError(source, `${namespace} "${id}" has ${propertyBlocks.length} <properties> blocks`);
  }

  const properties = new Map<string, string>();
  if (propertyBlocks.length) flattenChildren(propertyBlocks[0], "", properties);

  return Object.freeze({
    id,
    namespace,
    kind: optionalAttribute(element, "class"),
    extends: optionalAttribute(element, "extends"),
    component: componentRefs.length ? optionalAttribute(componentRefs[0], "ref") : null,
    properties,
    connections: Object.freeze(parseConnections(element, namespace)),
    source,
  });
}

function parseConnections(element: XmlNode, namespace: DefinitionNamespace): ConnectionRef[] {
  const block = firstChild(element, "connections");
  if (!block) return [];

  const connections: ConnectionRef[] = [];
  for (const conn of childrenByTag(block, "connection")) {
    const role = namespace === "component"
      ? optionalAttribute(conn, "name") ?? optionalAttribute(conn, "ref")
      : optionalAttribute(conn, "ref");
    if (!role) continue;
    const tags = Object.freeze((conn.attributes.tags ?? "").split(/\s+/).filter(Boolean));

    const targets = childrenByTag(conn, "macro");
    if (!targets.length) {
      connections.push(Object.freeze({ role, target: null, connection: null, tags }));
      continue;
    }
    for (const target of targets) {
      connections.push(
        Object.freeze({
          role,
          target: optionalAttribute(target, "ref"),
          connection: optionalAttribute(target, "connection"),
          tags,
        }),
      );
    }
  }
  return connections;
}

function parseWare(element: XmlNode, id: string, source: string): DefinitionNode {
  const properties = new Map<string, string>();
  for (const [name, value] of Object.entries(element.attributes)) {
    if (name !== "id") properties.set(name, value);
  }
  flattenChildren(element, "", properties);

  return Object.freeze({
    id,
    namespace: "ware",
    kind: "ware",
    extends: null,
    component: null,
    properties,
    connections: Object.freeze([]),
    source,
  });
}

/** Flatten the children of `node` into dotted keys under `prefix` */
function flattenChildren(node: XmlNode, prefix: string, out: Map<string, string>): void {
  const counts = new Map<string, number>();
  for (const child of node.children) counts.set(child.tag, (counts.get(child.tag) ?? 0) + 1);

  const positions = new Map<string, number>();
  for (const child of node.children) {
    let key = child.tag;
    if ((counts.get(child.tag) ?? 0) > 1) {
      const position = positions.get(child.tag) ?? 0;
      positions.set(child.tag, position + 1);
      key = `${child.tag}[${position}]`;
    }
    const path = prefix ? `${prefix}.${key}` : key;

    for (const [name, value] of Object.entries(child.attributes)) out.set(`${path}.${name}`, value);
    const text = textOf(child);
    if (text) out.set(path, text);
    flattenChildren(child, path, out);
  }
}
