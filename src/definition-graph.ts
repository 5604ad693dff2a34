/**
 * Session-wide arena of DefinitionNodes, keyed by namespace and identifier.
 * Documents are appended as they are loaded; the last one wins on collisions.
 */
import type { DefinitionNamespace, DefinitionNode } from "./definition-parser.js";
import logger from "./utils/logger.js";

export interface NodeReference {
  namespace: DefinitionNamespace;
  id: string;
  /** Identifier of the node holding the reference */
  from: string;
}

/** Extra references a node carries in its properties (e.g. a weapon's bullet macro) */
export type PropertyReferences = (node: DefinitionNode) => Iterable<string>;

function keyOf(namespace: DefinitionNamespace, id: string): string {
  return `${namespace}:${id}`;
}

export class DefinitionGraph {
  private nodes = new Map<string, DefinitionNode>();

  get size(): number {
    return this.nodes.size;
  }

  add(nodes: Iterable<DefinitionNode>): number {
    let added = 0;
    for (const node of nodes) {
      const key = keyOf(node.namespace, node.id);
      const previous = this.nodes.get(key);
      if (previous && previous.source !== node.source) {
        logger.debug(`${node.namespace} ${node.id} from ${node.source} replaces ${previous.source}`, { module: "graph" });
      }
      this.nodes.set(key, node);
      added++;
    }
    return added;
  }

  get(namespace: DefinitionNamespace, id: string): DefinitionNode | undefined {
    return this.nodes.get(keyOf(namespace, id));
  }

  has(namespace: DefinitionNamespace, id: string): boolean {
    return this.nodes.has(keyOf(namespace, id));
  }

  *inNamespace(namespace: DefinitionNamespace): IterableIterator<DefinitionNode> {
    for (const node of this.nodes.values()) {
      if (node.namespace === namespace) yield node;
    }
  }

  /** Every reference that points at an identifier not present in the graph */
  missingReferences(propertyReferences?: PropertyReferences): NodeReference[] {
    const missing = new Map<string, NodeReference>();
    const check = (namespace: DefinitionNamespace, id: string | null, from: string) => {
      if (id && !this.has(namespace, id) && !missing.has(keyOf(namespace, id))) {
        missing.set(keyOf(namespace, id), { namespace, id, from });
      }
    };

    for (const node of this.nodes.values()) {
      if (node.namespace === "ware") continue;
      check(node.namespace, node.extends, node.id);
      check("component", node.component, node.id);
      for (const conn of node.connections) check("macro", conn.target, node.id);
      if (propertyReferences) {
        for (const ref of propertyReferences(node)) check("macro", ref, node.id);
      }
    }
    return [...missing.values()];
  }
}
