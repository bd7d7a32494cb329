/**
 * Shared XML parsing and serialization settings
 *
 * Invariants:
 * - Attribute and text values stay strings (no number/boolean coercion)
 * - Elements listed in `arrayPaths` always parse to arrays, even with one child
 * - Serialized documents start with an XML declaration and end with a single newline
 */

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";

export const ATTR = "@_";

const DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

/**
 * Validate and parse an XML document
 * @param arrayPaths - Dotted element paths (e.g. "index.pindex.pdsc") that repeat
 * @returns Parsed tree, or an error message when the text is not well-formed
 */
export function parseXml(
  text: string,
  arrayPaths: ReadonlySet<string>
): { ok: true; value: unknown } | { ok: false; reason: string } {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    return { ok: false, reason: `${msg} (line ${line}, column ${col})` };
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR,
    ignoreDeclaration: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (_name, jpath) => arrayPaths.has(jpath),
  });

  return { ok: true, value: parser.parse(text) };
}

/**
 * Serialize a tree using the same attribute convention as parseXml
 */
export function buildXml(tree: Record<string, unknown>): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR,
    format: true,
    indentBy: "  ",
    suppressEmptyNode: true,
  });
  const body = builder.build(tree);
  return `${DECLARATION}${String(body).trimEnd()}\n`;
}
