/**
 * TripleIndex — In-memory triple index over a serialized document.
 *
 * Loading validates the whole document before any triple is indexed:
 * every object needs a @type, and every reference must resolve to a full
 * emission of the same type somewhere in the document. A reference and an
 * inline object produce the same triple.
 */

import { z } from 'zod';
import { MalformedDocumentError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { generateBlankNodeId } from '../jsonld/IdDeriver.js';
import { TYPE_PREDICATE } from './types.js';
import type { IndexStats, LiteralValue, Term, Triple } from './types.js';

const log = createLogger('triple-index');

const nodeHeaderSchema = z
  .object({
    '@type': z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
    '@id': z.string().min(1).optional(),
  })
  .passthrough();

/** Keys that never become triples */
const SKIPPED_KEYS = new Set(['@context', '@id', '@type']);

const NO_TRIPLES: readonly Triple[] = Object.freeze([]);

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * An object found while validating a document.
 */
interface ScannedObject {
  path: string;
  types: string[];
  /** Explicit @id, if any */
  id: string | undefined;
  isReference: boolean;
}

/**
 * Result of the validation pass.
 */
interface ScanResult {
  objects: Map<JsonObject, ScannedObject>;
  explicitIds: Set<string>;
  /** Types of each fully emitted id */
  fullTypes: Map<string, Set<string>>;
  references: ScannedObject[];
}

export class TripleIndex {
  private readonly triples: Triple[] = [];
  private readonly bySubject = new Map<string, Triple[]>();
  private readonly bySubjectPredicate = new Map<string, Map<string, Triple[]>>();
  private readonly typesById = new Map<string, string[]>();
  private readonly subjectsByType = new Map<string, string[]>();

  private constructor() {}

  /**
   * Build an index from a parsed document: a node object, an array of node
   * objects, or an object with a @graph array.
   */
  static load(document: unknown): TripleIndex {
    const roots = rootObjects(document);
    const scan = scanDocument(roots);
    const index = new TripleIndex();
    index.ingest(roots, scan);
    log.debug(`Indexed ${index.triples.length} triples for ${index.bySubject.size} subjects`);
    return index;
  }

  /**
   * Build an index from JSON text.
   */
  static fromJson(text: string): TripleIndex {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new MalformedDocumentError(
        'INVALID_DOCUMENT',
        `Document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        '$'
      );
    }
    return TripleIndex.load(parsed);
  }

  /**
   * All triples with `subject`, including its @type triples.
   */
  triplesOf(subject: string): readonly Triple[] {
    return this.bySubject.get(subject) ?? NO_TRIPLES;
  }

  /**
   * Triples matching (subject, predicate).
   */
  lookup(subject: string, predicate: string): readonly Triple[] {
    return this.bySubjectPredicate.get(subject)?.get(predicate) ?? NO_TRIPLES;
  }

  /**
   * Objects of the triples matching (subject, predicate).
   */
  objects(subject: string, predicate: string): Term[] {
    return this.lookup(subject, predicate).map(triple => triple.object);
  }

  /**
   * First literal object of (subject, predicate), if any.
   */
  literal(subject: string, predicate: string): LiteralValue | undefined {
    for (const triple of this.lookup(subject, predicate)) {
      if (triple.object.termType === 'literal') {
        return triple.object.value;
      }
    }
    return undefined;
  }

  typesOf(id: string): readonly string[] {
    return this.typesById.get(id) ?? [];
  }

  hasType(id: string, type: string): boolean {
    return this.typesOf(id).includes(type);
  }

  /**
   * Subjects declaring `type`, in document order.
   */
  subjectsOfType(type: string): readonly string[] {
    return this.subjectsByType.get(type) ?? [];
  }

  has(id: string): boolean {
    return this.typesById.has(id);
  }

  get size(): number {
    return this.triples.length;
  }

  get subjectCount(): number {
    return this.typesById.size;
  }

  all(): readonly Triple[] {
    return this.triples;
  }

  getStats(): IndexStats {
    return {
      tripleCount: this.triples.length,
      subjectCount: this.typesById.size,
      types: Array.from(this.subjectsByType.keys()).sort(),
    };
  }

  /**
   * Find a cycle among node-to-node edges.
   *
   * @returns The ids along the cycle, first id repeated at the end, or null
   */
  findCycle(): string[] | null {
    const state = new Map<string, 'active' | 'done'>();
    const stack: string[] = [];

    const visit = (id: string): string[] | null => {
      state.set(id, 'active');
      stack.push(id);
      for (const triple of this.triplesOf(id)) {
        if (triple.object.termType !== 'node') {
          continue;
        }
        const next = triple.object.id;
        const nextState = state.get(next);
        if (nextState === 'active') {
          return [...stack.slice(stack.indexOf(next)), next];
        }
        if (nextState === undefined) {
          const cycle = visit(next);
          if (cycle) {
            return cycle;
          }
        }
      }
      stack.pop();
      state.set(id, 'done');
      return null;
    };

    for (const id of this.typesById.keys()) {
      if (!state.has(id)) {
        const cycle = visit(id);
        if (cycle) {
          return cycle;
        }
      }
    }
    return null;
  }

  private ingest(roots: RootObject[], scan: ScanResult): void {
    const blankIds = new Map<JsonObject, string>();
    const emitted = new Set<JsonObject>();
    let blankCounter = 0;

    const idOf = (obj: JsonObject, info: ScannedObject): string => {
      if (info.id !== undefined) {
        return info.id;
      }
      const assigned = blankIds.get(obj);
      if (assigned !== undefined) {
        return assigned;
      }
      let candidate = generateBlankNodeId(blankCounter++);
      while (scan.explicitIds.has(candidate)) {
        candidate = generateBlankNodeId(blankCounter++);
      }
      blankIds.set(obj, candidate);
      return candidate;
    };

    const infoOf = (obj: JsonObject): ScannedObject => {
      const info = scan.objects.get(obj);
      if (info === undefined) {
        throw new MalformedDocumentError('INVALID_DOCUMENT', 'Object was not validated', '$');
      }
      return info;
    };

    const emitObject = (obj: JsonObject): string => {
      const info = infoOf(obj);
      const id = idOf(obj, info);
      if (info.isReference || emitted.has(obj)) {
        return id;
      }
      emitted.add(obj);
      for (const type of info.types) {
        this.addType(id, type);
      }
      for (const [key, value] of Object.entries(obj)) {
        if (!SKIPPED_KEYS.has(key)) {
          emitValue(id, key, value);
        }
      }
      return id;
    };

    const emitValue = (subject: string, predicate: string, value: unknown): void => {
      if (value === null) {
        return;
      }
      if (Array.isArray(value)) {
        for (const item of value) {
          emitValue(subject, predicate, item);
        }
        return;
      }
      if (isJsonObject(value)) {
        const objectId = emitObject(value);
        this.addTriple({ subject, predicate, object: { termType: 'node', id: objectId } });
        return;
      }
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        this.addTriple({ subject, predicate, object: { termType: 'literal', value } });
      }
    };

    for (const root of roots) {
      emitObject(root.value);
    }
  }

  private addType(id: string, type: string): void {
    const types = this.typesById.get(id) ?? [];
    if (types.includes(type)) {
      return;
    }
    types.push(type);
    this.typesById.set(id, types);

    const subjects = this.subjectsByType.get(type) ?? [];
    subjects.push(id);
    this.subjectsByType.set(type, subjects);

    this.addTriple({ subject: id, predicate: TYPE_PREDICATE, object: { termType: 'literal', value: type } });
  }

  private addTriple(triple: Triple): void {
    const frozen = Object.freeze(triple);
    this.triples.push(frozen);

    const forSubject = this.bySubject.get(triple.subject) ?? [];
    forSubject.push(frozen);
    this.bySubject.set(triple.subject, forSubject);

    let byPredicate = this.bySubjectPredicate.get(triple.subject);
    if (byPredicate === undefined) {
      byPredicate = new Map();
      this.bySubjectPredicate.set(triple.subject, byPredicate);
    }
    const forPredicate = byPredicate.get(triple.predicate) ?? [];
    forPredicate.push(frozen);
    byPredicate.set(triple.predicate, forPredicate);
  }
}

/**
 * Build an index from a parsed document.
 */
export function loadTripleIndex(document: unknown): TripleIndex {
  return TripleIndex.load(document);
}

interface RootObject {
  value: JsonObject;
  path: string;
}

function rootObjects(document: unknown): RootObject[] {
  if (Array.isArray(document)) {
    return document.map((item, i) => requireObject(item, `$[${i}]`));
  }
  const graph = isJsonObject(document) && !('@type' in document) ? document['@graph'] : undefined;
  if (Array.isArray(graph)) {
    return graph.map((item, i) => requireObject(item, `$['@graph'][${i}]`));
  }
  return [requireObject(document, '$')];
}

function requireObject(value: unknown, path: string): RootObject {
  if (!isJsonObject(value)) {
    throw new MalformedDocumentError('INVALID_DOCUMENT', 'Expected a node object', path);
  }
  return { value, path };
}

/**
 * Validate every object of the document and classify full emissions and
 * references.
 */
function scanDocument(roots: RootObject[]): ScanResult {
  const result: ScanResult = {
    objects: new Map(),
    explicitIds: new Set(),
    fullTypes: new Map(),
    references: [],
  };

  const scanObject = (obj: JsonObject, path: string): void => {
    if (result.objects.has(obj)) {
      return;
    }
    if (!('@type' in obj)) {
      throw new MalformedDocumentError('MISSING_TYPE', 'Object has no @type', path);
    }
    const header = nodeHeaderSchema.safeParse(obj);
    if (!header.success) {
      const issue = header.error.issues[0];
      throw new MalformedDocumentError(
        'INVALID_DOCUMENT',
        `Invalid node header: ${issue?.message ?? 'unknown error'}`,
        issue && issue.path.length > 0 ? `${path}.${issue.path.join('.')}` : path
      );
    }

    const declared = header.data['@type'];
    const types = typeof declared === 'string' ? [declared] : declared;
    const id = header.data['@id'];
    const contentKeys = Object.keys(obj).filter(key => !SKIPPED_KEYS.has(key));
    const info: ScannedObject = {
      path,
      types,
      id,
      isReference: id !== undefined && contentKeys.length === 0,
    };
    result.objects.set(obj, info);

    if (id !== undefined) {
      result.explicitIds.add(id);
      if (info.isReference) {
        result.references.push(info);
      } else {
        const known = result.fullTypes.get(id) ?? new Set<string>();
        for (const type of types) {
          known.add(type);
        }
        result.fullTypes.set(id, known);
      }
    }

    for (const key of contentKeys) {
      scanValue(obj[key], `${path}.${key}`);
    }
  };

  const scanValue = (value: unknown, path: string): void => {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
      return;
    }
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new MalformedDocumentError('INVALID_DOCUMENT', 'Numbers must be finite', path);
      }
      return;
    }
    if (Array.isArray(value)) {
      value.forEach((item, i) => scanValue(item, `${path}[${i}]`));
      return;
    }
    if (isJsonObject(value)) {
      scanObject(value, path);
      return;
    }
    throw new MalformedDocumentError('INVALID_DOCUMENT', `Unsupported value of type ${typeof value}`, path);
  };

  for (const root of roots) {
    scanObject(root.value, root.path);
  }

  for (const ref of result.references) {
    const refId = ref.id ?? '';
    const fullTypes = result.fullTypes.get(refId);
    if (fullTypes === undefined) {
      throw new MalformedDocumentError(
        'DANGLING_REFERENCE',
        `Reference to ${refId} has no full emission in the document`,
        ref.path
      );
    }
    const mismatched = ref.types.find(type => !fullTypes.has(type));
    if (mismatched !== undefined) {
      throw new MalformedDocumentError(
        'TYPE_MISMATCH',
        `Reference to ${refId} declares type ${mismatched}, not declared by its full emission`,
        ref.path
      );
    }
  }

  return result;
}
