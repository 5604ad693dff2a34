/**
 * XML documents → plain element trees.
 *
 * Game definition and language files are small enough to be held as a tree;
 * saxes does the tokenizing and rejects anything that is not well formed.
 */
import { SaxesParser } from "saxes";
import { MalformedDefinitionError } from "../errors.js";

// ============================================================
//  Types
// ============================================================

export interface XmlNode {
  tag: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  /** Concatenated text directly inside the element (untrimmed) */
  content?: string;
}

// ============================================================
//  Decoding
// ============================================================

/** Decode UTF-8 or BOM-prefixed UTF-16LE text */
export function decodeText(buffer: Buffer): string {
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
    return buffer.subarray(2).toString("utf16le");
  }
  if (buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) {
    return buffer.subarray(3).toString("utf8");
  }
  return buffer.toString("utf8");
}

// ============================================================
//  Parsing
// ============================================================

/**
 * Parse a document into its root element.
 * Throws MalformedDefinitionError (naming `source`) on any syntax error.
 */
export function parseXml(input: Buffer | string, source: string): XmlNode {
  const text = typeof input === "string" ? input : decodeText(input);
  const parser = new SaxesParser<{ position: true; xmlns?: false }>({ position: true });
  const stack: XmlNode[] = [];
  const roots: XmlNode[] = [];

  parser.on("opentag", (tag) => {
    const node: XmlNode = { tag: tag.name, attributes: { ...tag.attributes }, children: [] };
    const parent = stack[stack.length - 1];
    if (parent) parent.children.push(node);
    else roots.push(node);
    stack.push(node);
  });
  parser.on("closetag", () => {
    stack.pop();
  });
  const appendText = (chunk: string) => {
    const current = stack[stack.length - 1];
    if (current) current.content = (current.content ?? "") + chunk;
  };
  parser.on("text", appendText);
  parser.on("cdata", appendText);

  try {
    parser.write(text).close();
  } catch (e) {
    throw new MalformedDefinitionError(source, e instanceof Error ? e.message : String(e));
  }

  const [root] = roots;
  if (!root) throw new MalformedDefinitionError(source, "document has no root element");
  return root;
}

// ============================================================
//  Navigation helpers
// ============================================================

export function childrenByTag(node: XmlNode, tag: string): XmlNode[] {
  return node.children.filter((c) => c.tag === tag);
}

export function firstChild(node: XmlNode, tag: string): XmlNode | undefined {
  return node.children.find((c) => c.tag === tag);
}

export function textOf(node: XmlNode): string {
  return (node.content ?? "").trim();
}
