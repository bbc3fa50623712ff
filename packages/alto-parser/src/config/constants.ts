export const ALTO_VERSIONS = ['alto-1', 'alto-2', 'alto-3', 'alto-4'] as const;

export type AltoVersion = (typeof ALTO_VERSIONS)[number];

/**
 * ALTO namespace URIs accepted by the parser, keyed by schema generation
 */
export const ALTO_NAMESPACES = {
  'alto-1': 'http://schema.ccs-gmbh.com/ALTO',
  'alto-2': 'http://www.loc.gov/standards/alto/ns-v2#',
  'alto-3': 'http://www.loc.gov/standards/alto/ns-v3#',
  'alto-4': 'http://www.loc.gov/standards/alto/ns-v4#',
} as const satisfies Record<AltoVersion, string>;

/**
 * ALTO element names the parser walks
 */
export const ALTO_TAGS = {
  PAGE: 'Page',
  TEXT_BLOCK: 'TextBlock',
  TEXT_LINE: 'TextLine',
  STRING: 'String',
} as const;

/**
 * Parser defaults
 */
export const ALTO_PARSER = {
  DEFAULT_FILE_ENDING: '.xml',
  DEFAULT_LINE_TYPE: 'TextLine',

  /**
   * Prefixes for IDs generated when an element has no ID attribute
   */
  GENERATED_ID_PREFIX: {
    TextBlock: 'block',
    TextLine: 'line',
  },
} as const;
