/**
 * ContextBuilder — Build the @context of a DATS document.
 *
 * The @context maps DATS property names and type tags to vocabulary
 * IRIs so the document can be read as linked data.
 */

import type { ContextOptions, ContextTerm, JsonLdContext } from './types.js';

/**
 * Default prefixes for the vocabularies DATS documents use.
 */
export const DEFAULT_PREFIXES: Record<string, string> = {
  dats: 'http://w3id.org/dats/',
  sdo: 'https://schema.org/',
  obo: 'http://purl.obolibrary.org/obo/',
  rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
  rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
  xsd: 'http://www.w3.org/2001/XMLSchema#',
};

/**
 * Ontology terms for DATS types and properties that queries rely on.
 */
const DATS_TERMS: Record<string, string | ContextTerm> = {
  Dataset: 'obo:IAO_0000100',
  Dimension: 'obo:STATO_0000258',
  Identifier: 'obo:IAO_0000577',
  identifier: { '@id': 'obo:IAO_0000577' },
  hasPart: { '@id': 'obo:BFO_0000051', '@container': '@list' },
  dimensions: { '@id': 'obo:BFO_0000051', '@container': '@list' },
  description: 'obo:IAO_0000300',
  name: 'obo:IAO_0000590',
  value: 'sdo:value',
  members: { '@id': 'obo:RO_0002351', '@container': '@list' },
  memberOf: { '@id': 'obo:RO_0002350', '@type': '@id' },
};

/**
 * Build the @context of a DATS document.
 */
export function buildContext(options: ContextOptions = {}): JsonLdContext {
  const context: JsonLdContext = {};

  if (options.vocab) {
    context['@vocab'] = options.vocab;
  }

  for (const [prefix, uri] of Object.entries(DEFAULT_PREFIXES)) {
    context[prefix] = uri;
  }

  // Custom prefixes override defaults
  if (options.prefixes) {
    for (const [prefix, uri] of Object.entries(options.prefixes)) {
      context[prefix] = uri;
    }
  }

  if (options.namespace) {
    context['local'] = options.namespace.endsWith('/')
      ? options.namespace
      : `${options.namespace}/`;
  }

  for (const [term, definition] of Object.entries(DATS_TERMS)) {
    context[term] = definition;
  }

  return context;
}
