import * as path from 'path';
import Ajv from 'ajv';
import { FAULT_URGENCIES, FaultCategory, FaultUrgency, INTENTS, Intent, isIntent } from '../config/types';
import { loadYamlFile } from '../config/yaml-file';
import { ConfigurationError } from '../errors';
import { CompiledTerm, compileTerm } from '../text/normalize';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const DEFAULT_LEXICON_FILE = path.resolve(PROJECT_ROOT, 'config', 'lexicon.yaml');

// ───── Raw file shape ─────

interface LexiconFile {
  intents: Record<string, Record<string, number>>;
  sentiment: {
    angry: string[];
    frustrated: string[];
    positive: string[];
    negations: string[];
    intensifiers: string[];
  };
  lead: {
    bands: Record<string, string[]>;
    intentFloors: Record<string, number>;
  };
  legal: string[];
  faults: {
    urgency: Record<string, string[]>;
    categories: Record<string, string[]>;
  };
}

const termList = { type: 'array', items: { type: 'string', minLength: 1 } };
const termTable = { type: 'object', additionalProperties: termList };

const lexiconSchema = {
  type: 'object',
  required: ['intents', 'sentiment', 'lead', 'legal', 'faults'],
  properties: {
    intents: {
      type: 'object',
      additionalProperties: { type: 'object', additionalProperties: { type: 'number', exclusiveMinimum: 0 } },
    },
    sentiment: {
      type: 'object',
      required: ['angry', 'frustrated', 'positive', 'negations', 'intensifiers'],
      properties: {
        angry: termList,
        frustrated: termList,
        positive: termList,
        negations: termList,
        intensifiers: termList,
      },
    },
    lead: {
      type: 'object',
      required: ['bands', 'intentFloors'],
      properties: {
        bands: termTable,
        intentFloors: { type: 'object', additionalProperties: { type: 'integer', minimum: 1, maximum: 5 } },
      },
    },
    legal: termList,
    faults: {
      type: 'object',
      required: ['urgency', 'categories'],
      properties: { urgency: termTable, categories: termTable },
    },
  },
};

const validateLexiconFile = new Ajv({ allErrors: true }).compile<LexiconFile>(lexiconSchema);

// ───── Compiled lexicon ─────

export interface LeadBand {
  score: number;
  terms: readonly CompiledTerm[];
}

export interface Lexicon {
  /** In INTENTS declaration order, which is also the tie-break order */
  intents: ReadonlyArray<{ intent: Intent; terms: readonly CompiledTerm[] }>;
  sentiment: {
    angry: readonly CompiledTerm[];
    frustrated: readonly CompiledTerm[];
    positive: readonly CompiledTerm[];
    negations: ReadonlySet<string>;
    intensifiers: readonly CompiledTerm[];
  };
  /** Highest band first */
  leadBands: readonly LeadBand[];
  intentFloors: Readonly<Partial<Record<Intent, number>>>;
  legal: readonly string[];
  faultUrgency: ReadonlyArray<{ urgency: FaultUrgency; terms: readonly CompiledTerm[] }>;
  faultCategories: ReadonlyArray<{ category: FaultCategory; terms: readonly CompiledTerm[] }>;
}

const FAULT_CATEGORIES: readonly FaultCategory[] = [
  'water',
  'electrical',
  'heating',
  'security',
  'structural',
  'appliance',
];

function compileList(terms: readonly string[]): readonly CompiledTerm[] {
  return Object.freeze(terms.map((t) => compileTerm(t)));
}

export function compileLexicon(file: LexiconFile): Lexicon {
  for (const name of Object.keys(file.intents)) {
    if (!isIntent(name)) throw new ConfigurationError(`Unknown intent in lexicon: ${name}`, { intent: name });
  }

  const intents = INTENTS.filter((i) => file.intents[i] !== undefined).map((intent) => ({
    intent,
    terms: Object.freeze(Object.entries(file.intents[intent]).map(([term, weight]) => compileTerm(term, weight))),
  }));

  const positive = compileList(file.sentiment.positive);
  const multiWord = positive.find((t) => t.needle.trim().includes(' '));
  if (multiWord) {
    throw new ConfigurationError(`Positive sentiment terms must be single words: ${multiWord.source}`);
  }

  const leadBands = Object.entries(file.lead.bands)
    .map(([band, terms]) => {
      const score = Number(band);
      if (!Number.isInteger(score) || score < 1 || score > 5) {
        throw new ConfigurationError(`Lead band must be 1..5, got ${band}`);
      }
      return { score, terms: compileList(terms) };
    })
    .sort((a, b) => b.score - a.score);

  const intentFloors: Partial<Record<Intent, number>> = {};
  for (const [name, floor] of Object.entries(file.lead.intentFloors)) {
    if (!isIntent(name)) throw new ConfigurationError(`Unknown intent in lead floors: ${name}`);
    intentFloors[name] = floor;
  }

  const faultUrgency = [...FAULT_URGENCIES]
    .reverse()
    .filter((u) => file.faults.urgency[u] !== undefined)
    .map((urgency) => ({ urgency, terms: compileList(file.faults.urgency[urgency]) }));

  const faultCategories = FAULT_CATEGORIES.filter((c) => file.faults.categories[c] !== undefined).map(
    (category) => ({ category, terms: compileList(file.faults.categories[category]) }),
  );

  return Object.freeze({
    intents: Object.freeze(intents),
    sentiment: Object.freeze({
      angry: compileList(file.sentiment.angry),
      frustrated: compileList(file.sentiment.frustrated),
      positive,
      negations: new Set(file.sentiment.negations.map((n) => n.toLowerCase())),
      intensifiers: compileList(file.sentiment.intensifiers),
    }),
    leadBands: Object.freeze(leadBands),
    intentFloors: Object.freeze(intentFloors),
    legal: Object.freeze([...file.legal]),
    faultUrgency: Object.freeze(faultUrgency),
    faultCategories: Object.freeze(faultCategories),
  });
}

export function loadLexicon(filepath: string = DEFAULT_LEXICON_FILE): Lexicon {
  return compileLexicon(loadYamlFile(filepath, validateLexiconFile));
}

let cached: Lexicon | undefined;

/** Lexicon from config/lexicon.yaml, compiled once per process */
export function defaultLexicon(): Lexicon {
  if (!cached) cached = loadLexicon();
  return cached;
}
