/**
 * Splits a batch efetch response into one standalone XML document per record.
 *
 * Uses fast-xml-parser with `preserveOrder: true` so each record is re-serialised
 * with its children in document order. Entity processing is off on both sides,
 * leaving escaped text exactly as the upstream sent it.
 */

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { ChunkFailure, TransientUpstreamError, excerpt } from "../errors.js";

/**
 * A node in the preserveOrder output: `{ tagName: OrderedNode[], ":@"?: attributes }`
 * or a text/comment/cdata node.
 */
type OrderedNode = Record<string, unknown>;

const SHARED_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  commentPropName: "#comment",
  cdataPropName: "#cdata",
  preserveOrder: true,
  processEntities: false,
} as const;

const parser = new XMLParser({
  ...SHARED_OPTIONS,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
});

const builder = new XMLBuilder({
  ...SHARED_OPTIONS,
  suppressEmptyNode: false,
});

/** Keys that are not element names. */
const NON_ELEMENT_KEYS = new Set([":@", "#text", "#comment", "#cdata"]);

function isOrderedNodeList(value: unknown): value is OrderedNode[] {
  return (
    Array.isArray(value) &&
    value.every((item) => typeof item === "object" && item !== null && !Array.isArray(item))
  );
}

/** Get the element name of an ordered node, or undefined for text and instructions. */
function getTagName(node: OrderedNode): string | undefined {
  for (const key of Object.keys(node)) {
    if (!NON_ELEMENT_KEYS.has(key) && !key.startsWith("?")) return key;
  }
  return undefined;
}

function getChildren(node: OrderedNode, tag: string): OrderedNode[] {
  const children = node[tag];
  return isOrderedNodeList(children) ? children : [];
}

/**
 * Extract the records named `recordTag` directly beneath the document root.
 * A root element that is itself a record yields that single record.
 *
 * @throws TransientUpstreamError (malformed) when the body is not well-formed XML
 */
export function splitRecords(xml: string, recordTag: string): string[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new TransientUpstreamError(
      "malformed",
      `Invalid XML at line ${validation.err.line}: ${validation.err.msg}`,
      { bodyExcerpt: excerpt(xml) }
    );
  }

  const parsed: unknown = parser.parse(xml);
  const topLevel = isOrderedNodeList(parsed) ? parsed : [];
  const root = topLevel.find((node) => getTagName(node) !== undefined);
  if (!root) return [];

  const rootTag = getTagName(root);
  if (rootTag === recordTag) return [String(builder.build([root]))];
  if (!rootTag) return [];

  return getChildren(root, rootTag)
    .filter((child) => getTagName(child) === recordTag)
    .map((record) => String(builder.build([record])));
}

export interface PairedDocument {
  identifier: string;
  document: string;
}

/**
 * Pair each requested identifier with the record at the same position.
 * The pairing is only made when the counts agree; otherwise every later
 * record would be attributed to the wrong identifier.
 *
 * @throws ChunkFailure (count_mismatch) when the counts differ
 */
export function pairDocuments(identifiers: readonly string[], documents: readonly string[]): PairedDocument[] {
  if (identifiers.length !== documents.length) {
    throw new ChunkFailure(
      "count_mismatch",
      `expected ${identifiers.length} documents, received ${documents.length}`
    );
  }
  return identifiers.map((identifier, i) => ({ identifier, document: documents[i] ?? "" }));
}
