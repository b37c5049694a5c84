import * as fs from 'fs';
import * as path from 'path';
import { TenantContext } from '../config/tenant-loader';
import { ConfigurationError } from '../errors';
import { CatalogHit } from '../knowledge/knowledge-catalog';
import { FactKey, KnownFacts } from '../memory/types';
import { renderTemplate, unknownPlaceholders } from '../text/template';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const DEFAULT_SYSTEM_PROMPT_FILE = path.resolve(PROJECT_ROOT, 'prompts', 'system.md');

export const GROUNDED_INSTRUCTION =
  'Använd underlaget nedan som enda faktakälla. Täcker det inte frågan, säg det och hänvisa till kontaktuppgifterna.';

export const DEFER_INSTRUCTION =
  'Det finns inget underlag för den här frågan. Gissa inte: säg att du inte kan svara säkert och hänvisa till ' +
  'kontaktuppgifterna ovan.';

const FACT_LABELS: ReadonlyArray<[FactKey, string]> = [
  ['name', 'Namn'],
  ['email', 'E-post'],
  ['phone', 'Telefon'],
  ['property', 'Adress'],
  ['issue_category', 'Ärendetyp'],
];

/** Catalog hits as the grounding block handed to the remote model */
export function formatGrounding(hits: readonly CatalogHit[]): string {
  return hits.map((h) => `- ${h.entry.question}\n  ${h.entry.answer}`).join('\n');
}

/**
 * Builds the system prompt for the remote model from prompts/system.md,
 * the tenant profile and what the session knows about the customer.
 */
export class PromptComposer {
  private constructor(private readonly template: string) {}

  static fromTemplate(template: string): PromptComposer {
    const unknown = unknownPlaceholders(template);
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown placeholder(s) in system prompt: ${unknown.join(', ')}`);
    }
    return new PromptComposer(template);
  }

  static fromFile(filepath: string = DEFAULT_SYSTEM_PROMPT_FILE): PromptComposer {
    return PromptComposer.fromTemplate(fs.readFileSync(filepath, 'utf-8'));
  }

  compose(tenant: TenantContext, facts: Readonly<KnownFacts>, hasGrounding: boolean): string {
    const sections = [renderTemplate(this.template, tenant.values, 'system prompt').trim()];

    const known = FACT_LABELS.flatMap(([key, label]) => (facts[key] ? [`- ${label}: ${facts[key]}`] : []));
    if (known.length > 0) sections.push(`## Kunden\n${known.join('\n')}`);

    sections.push(hasGrounding ? GROUNDED_INSTRUCTION : DEFER_INSTRUCTION);
    return sections.join('\n\n');
  }
}
