import type { LoggerMethods } from '@altokit/logger';
import type {
  ElementPosition,
  ElementSeed,
  ElementType,
} from '@altokit/model';

import { XMLParser, XMLValidator } from 'fast-xml-parser';

import {
  ALTO_NAMESPACES,
  ALTO_TAGS,
  ALTO_VERSIONS,
  type AltoVersion,
} from '../config/constants';
import { AltoParseError } from '../errors/alto-parse-error';
import { IdGenerator } from '../utils/id-generator';
import { TextSanitizer } from '../utils/text-sanitizer';

/**
 * Element of the parsed XML tree, in document order
 */
interface XmlElement {
  /**
   * Tag name without namespace prefix
   */
  name: string;
  /**
   * Namespace prefix of the tag, empty when unprefixed
   */
  prefix: string;
  attributes: Record<string, string>;
  children: XmlElement[];
}

export interface AltoXmlReaderOptions {
  /**
   * Granularity of the produced elements
   */
  lineType: ElementType;

  /**
   * Generate IDs for elements without an ID attribute (default: true)
   */
  generateMissingIds?: boolean;
}

/**
 * Result of reading one ALTO document
 */
export interface AltoReadResult {
  version: AltoVersion;
  elements: ElementSeed[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const localName = (tag: string): string => {
  const separator = tag.indexOf(':');
  return separator === -1 ? tag : tag.slice(separator + 1);
};

const prefixOf = (tag: string): string => {
  const separator = tag.indexOf(':');
  return separator === -1 ? '' : tag.slice(0, separator);
};

const toNumber = (value: string | undefined): number | null => {
  if (value === undefined || value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * AltoXmlReader
 *
 * Flattens one ALTO document into element seeds. Every `TextBlock` below the
 * layout (including blocks nested in `ComposedBlock`s) is visited in document
 * order. A line's text is the space-joined `CONTENT` of its `String` children;
 * a block's text is the space-joined text of its lines.
 */
export class AltoXmlReader {
  private readonly lineType: ElementType;
  private readonly generateMissingIds: boolean;
  private readonly xmlParser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseAttributeValue: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    htmlEntities: true,
  });

  constructor(
    private readonly logger: LoggerMethods,
    options: AltoXmlReaderOptions,
  ) {
    this.lineType = options.lineType;
    this.generateMissingIds = options.generateMissingIds ?? true;
  }

  /**
   * Read an ALTO document
   *
   * @param xml - Raw file content
   * @param filePath - Used in log and error messages only
   * @throws {AltoParseError} When the content is not well-formed XML or has no ALTO namespace
   */
  read(xml: string, filePath: string): AltoReadResult {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new AltoParseError(
        `The file '${filePath}' is not a valid XML file: ${validation.err.msg} (line ${validation.err.line})`,
        { filePath },
      );
    }

    const roots = this.toElements(this.xmlParser.parse(xml));
    const root = roots.find((element) => element.name === 'alto');
    if (!root) {
      throw new AltoParseError(
        `The file '${filePath}' has no <alto> root element`,
        { filePath },
      );
    }

    const version = this.detectVersion(root);
    if (!version) {
      throw new AltoParseError(
        `No valid ALTO namespace has been found in '${filePath}'`,
        { filePath },
      );
    }

    const elements: ElementSeed[] = [];
    this.walk(root, null, elements, new IdGenerator(this.collectIds(root)));

    this.logger.debug(
      `[AltoXmlReader] Read ${elements.length} ${this.lineType} elements from ${filePath} (${version})`,
    );

    return { version, elements };
  }

  /**
   * The namespace bound to the root's own prefix: `xmlns` for `<alto>`,
   * `xmlns:<prefix>` for `<prefix:alto>`
   */
  private detectVersion(root: XmlElement): AltoVersion | null {
    const namespace =
      root.attributes[root.prefix ? `xmlns:${root.prefix}` : 'xmlns'];
    return (
      ALTO_VERSIONS.find((version) => ALTO_NAMESPACES[version] === namespace) ??
      null
    );
  }

  /**
   * Convert the ordered output of fast-xml-parser into XmlElements
   */
  private toElements(nodes: unknown): XmlElement[] {
    if (!Array.isArray(nodes)) return [];

    const elements: XmlElement[] = [];
    for (const node of nodes) {
      if (!isRecord(node)) continue;

      const rawAttributes = node[':@'];
      const attributes: Record<string, string> = {};
      if (isRecord(rawAttributes)) {
        for (const [key, value] of Object.entries(rawAttributes)) {
          attributes[this.attributeName(key)] = String(value);
        }
      }

      for (const [key, value] of Object.entries(node)) {
        if (key === ':@' || key === '#text') continue;
        elements.push({
          name: localName(key),
          prefix: prefixOf(key),
          attributes,
          children: this.toElements(value),
        });
      }
    }
    return elements;
  }

  /**
   * Strip namespace prefixes from attribute names; namespace declarations
   * keep their full name
   */
  private attributeName(key: string): string {
    return key.startsWith('xmlns:') ? key : localName(key);
  }

  private collectIds(element: XmlElement, ids = new Set<string>()): Set<string> {
    const id = element.attributes.ID?.trim();
    if (id) ids.add(id);
    for (const child of element.children) {
      this.collectIds(child, ids);
    }
    return ids;
  }

  private walk(
    element: XmlElement,
    pageId: string | null,
    out: ElementSeed[],
    ids: IdGenerator,
  ): void {
    if (element.name === ALTO_TAGS.TEXT_BLOCK) {
      this.readBlock(element, pageId, out, ids);
      return;
    }

    const nextPageId =
      element.name === ALTO_TAGS.PAGE
        ? (element.attributes.ID ?? pageId)
        : pageId;

    for (const child of element.children) {
      this.walk(child, nextPageId, out, ids);
    }
  }

  private readBlock(
    block: XmlElement,
    pageId: string | null,
    out: ElementSeed[],
    ids: IdGenerator,
  ): void {
    const blockId = this.resolveId(block, 'TextBlock', ids);
    const parentId = blockId || null;
    const lineTexts: string[] = [];

    for (const line of this.descendants(block, ALTO_TAGS.TEXT_LINE)) {
      const text = TextSanitizer.join(
        line.children
          .filter((child) => child.name === ALTO_TAGS.STRING)
          .map((child) => child.attributes.CONTENT ?? ''),
      );
      lineTexts.push(text);

      if (this.lineType === 'TextLine') {
        out.push(this.createSeed(line, 'TextLine', text, parentId, ids));
      }
    }

    if (this.lineType === 'TextBlock') {
      out.push({
        id: blockId,
        type: 'TextBlock',
        text: TextSanitizer.join(lineTexts),
        position: this.readPosition(block),
        parentId: pageId,
      });
    }
  }

  private createSeed(
    element: XmlElement,
    type: ElementType,
    text: string,
    parentId: string | null,
    ids: IdGenerator,
  ): ElementSeed {
    return {
      id: this.resolveId(element, type, ids),
      type,
      text,
      position: this.readPosition(element),
      parentId,
    };
  }

  private resolveId(
    element: XmlElement,
    type: ElementType,
    ids: IdGenerator,
  ): string {
    const id = element.attributes.ID?.trim();
    if (id) return id;
    return this.generateMissingIds ? ids.generate(type) : '';
  }

  private readPosition(element: XmlElement): ElementPosition {
    const { HPOS, VPOS, WIDTH, HEIGHT, BASELINE } = element.attributes;
    return {
      hpos: toNumber(HPOS),
      vpos: toNumber(VPOS),
      width: toNumber(WIDTH),
      height: toNumber(HEIGHT),
      baseline: BASELINE ?? null,
    };
  }

  private descendants(element: XmlElement, name: string): XmlElement[] {
    const found: XmlElement[] = [];
    for (const child of element.children) {
      if (child.name === name) {
        found.push(child);
      } else {
        found.push(...this.descendants(child, name));
      }
    }
    return found;
  }
}
