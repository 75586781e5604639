import { promises as fs } from 'fs';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { logger } from '../utils/logger.js';

export class CatalogError extends Error {
  readonly name = 'CatalogError';
}

export interface XmlElement {
  tag: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export interface XmlText {
  text: string;
}

export type XmlNode = XmlElement | XmlText;

/**
 * A parsed GNUtunesDB.xml. Node order, unknown elements and unknown
 * attributes are all kept so the file can be written back as it was.
 */
export interface GnuTunesDb {
  nodes: XmlNode[];
}

// fast-xml-parser's ordered form: one key per node, attributes under ':@'
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const xmlOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
} as const;

const parser = new XMLParser({
  ...xmlOptions,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

const builder = new XMLBuilder({
  ...xmlOptions,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isElement(node: XmlNode): node is XmlElement {
  return 'tag' in node;
}

function readAttributes(raw: unknown): Record<string, string> {
  if (raw === undefined) return {};
  if (!isRecord(raw)) throw new CatalogError('Malformed attribute list');
  return Object.fromEntries(Object.entries(raw).map(([key, value]) => [key, String(value)]));
}

function toXmlNode(raw: unknown): XmlNode {
  if (!isRecord(raw)) throw new CatalogError('Malformed XML node');

  const tag = Object.keys(raw).find((key) => key !== ATTRIBUTES_KEY);
  if (tag === undefined) throw new CatalogError('XML node without a tag');

  const content = raw[tag];
  if (tag === TEXT_KEY) return { text: String(content) };
  if (!Array.isArray(content)) throw new CatalogError(`Malformed content for <${tag}>`);

  return {
    tag,
    attributes: readAttributes(raw[ATTRIBUTES_KEY]),
    children: content.map(toXmlNode),
  };
}

function fromXmlNode(node: XmlNode): Record<string, unknown> {
  if (!isElement(node)) return { [TEXT_KEY]: node.text };

  const raw: Record<string, unknown> = { [node.tag]: node.children.map(fromXmlNode) };
  if (Object.keys(node.attributes).length > 0) raw[ATTRIBUTES_KEY] = node.attributes;
  return raw;
}

export function parseGnuTunesDb(xml: string): GnuTunesDb {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new CatalogError(`Invalid XML at ${line}:${col}: ${msg}`);
  }

  const parsed: unknown = parser.parse(xml);
  if (!Array.isArray(parsed)) throw new CatalogError('Unexpected XML document shape');
  return { nodes: parsed.map(toXmlNode) };
}

export function serializeGnuTunesDb(db: GnuTunesDb): string {
  const xml: string = builder.build(db.nodes.map(fromXmlNode));
  return xml.endsWith('\n') ? xml : `${xml}\n`;
}

/** Index of the document element, skipping the `<?xml ...?>` declaration. */
export function rootIndex(db: GnuTunesDb): number {
  const index = db.nodes.findIndex((node) => isElement(node) && !node.tag.startsWith('?'));
  if (index === -1) throw new CatalogError('Document has no root element');
  return index;
}

export function rootElement(db: GnuTunesDb): XmlElement {
  const root = db.nodes[rootIndex(db)];
  if (!isElement(root)) throw new CatalogError('Document has no root element');
  return root;
}

export function childElements(element: XmlElement, tag: string): XmlElement[] {
  return element.children.filter((child): child is XmlElement => isElement(child) && child.tag === tag);
}

export async function readGnuTunesDb(path: string): Promise<GnuTunesDb> {
  const xml = await fs.readFile(path, 'utf8');
  const db = parseGnuTunesDb(xml);
  logger.debug({ path, bytes: xml.length }, 'GNUtunesDB parsed');
  return db;
}

export async function writeGnuTunesDb(path: string, db: GnuTunesDb): Promise<void> {
  await fs.writeFile(path, serializeGnuTunesDb(db), 'utf8');
  logger.info({ path }, 'GNUtunesDB written');
}
