import * as path from 'path';
import { Intent, PatternRuleConfig, Priority } from '../config/types';
import { validatePatternsFile } from '../config/tenant-schema';
import { loadYamlFile } from '../config/yaml-file';
import { ConfigurationError } from '../errors';
import { CompiledTerm, compileTerm, normalize, termMatches, toTokenText } from '../text/normalize';
import { TemplateValues, renderTemplate } from '../text/template';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const DEFAULT_PATTERNS_FILE = path.resolve(PROJECT_ROOT, 'config', 'patterns.yaml');

const DEFAULT_CONFIDENCE = 0.85;

export interface MatchResult {
  category: string;
  intent: Intent;
  priority: Priority;
  emergency: boolean;
  /** Already rendered against the tenant profile */
  response: string;
  confidence: number;
  leadScoreHint?: number;
}

interface CompiledRule {
  readonly result: Readonly<MatchResult>;
  readonly regex?: RegExp;
  readonly terms: readonly CompiledTerm[];
}

/**
 * Ordered, frozen table of canned answers. First matching rule wins, so
 * emergencies are declared before pleasantries in config/patterns.yaml.
 */
export class PatternMatcher {
  private readonly rules: readonly CompiledRule[];

  private constructor(rules: CompiledRule[]) {
    this.rules = Object.freeze(rules);
  }

  /**
   * Compile a rule list. Rules are tried in list order; duplicate
   * categories are a configuration error.
   */
  static compile(configs: readonly PatternRuleConfig[], values: TemplateValues): PatternMatcher {
    const seen = new Set<string>();
    const rules: CompiledRule[] = [];

    for (const cfg of configs) {
      if (seen.has(cfg.category)) {
        throw new ConfigurationError(`Duplicate pattern category: ${cfg.category}`, { category: cfg.category });
      }
      seen.add(cfg.category);

      let regex: RegExp | undefined;
      if (cfg.regex) {
        try {
          regex = new RegExp(cfg.regex, 'iu');
        } catch (err) {
          throw new ConfigurationError(`Invalid regex for pattern ${cfg.category}: ${String(err)}`, {
            category: cfg.category,
          });
        }
      }

      rules.push({
        regex,
        terms: Object.freeze((cfg.keywords ?? []).map((k) => compileTerm(k))),
        result: Object.freeze({
          category: cfg.category,
          intent: cfg.intent,
          priority: cfg.priority ?? (cfg.emergency ? 'critical' : 'low'),
          emergency: cfg.emergency ?? false,
          response: renderTemplate(cfg.response, values, `pattern ${cfg.category}`),
          confidence: cfg.confidence ?? DEFAULT_CONFIDENCE,
          leadScoreHint: cfg.leadScoreHint,
        }),
      });
    }

    return new PatternMatcher(rules);
  }

  /** Never throws; returns null when no rule applies */
  match(text: string): Readonly<MatchResult> | null {
    const normalized = normalize(text);
    if (!normalized) return null;
    const tokenText = toTokenText(normalized);

    for (const rule of this.rules) {
      if (rule.regex && rule.regex.test(normalized)) return rule.result;
      if (rule.terms.some((t) => termMatches(t, tokenText))) return rule.result;
    }
    return null;
  }

  get size(): number {
    return this.rules.length;
  }

  categories(): string[] {
    return this.rules.map((r) => r.result.category);
  }
}

/**
 * Tenant rules take precedence; built-in rules whose category the tenant
 * already declares are dropped.
 */
export function mergePatternConfigs(
  tenantRules: readonly PatternRuleConfig[],
  defaults: readonly PatternRuleConfig[],
): PatternRuleConfig[] {
  const declared = new Set(tenantRules.map((r) => r.category));
  return [...tenantRules, ...defaults.filter((r) => !declared.has(r.category))];
}

let cachedDefaults: readonly PatternRuleConfig[] | undefined;

export function loadDefaultPatterns(filepath: string = DEFAULT_PATTERNS_FILE): readonly PatternRuleConfig[] {
  if (filepath === DEFAULT_PATTERNS_FILE && cachedDefaults) return cachedDefaults;
  const file = loadYamlFile(filepath, validatePatternsFile);
  const patterns = Object.freeze(file.patterns);
  if (filepath === DEFAULT_PATTERNS_FILE) cachedDefaults = patterns;
  return patterns;
}
