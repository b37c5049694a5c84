import * as fs from 'fs';
import * as path from 'path';
import { Lexicon, defaultLexicon } from '../classifier/lexicon';
import { EscalationEngine } from '../escalation/escalation-engine';
import { ConfigurationError } from '../errors';
import { KnowledgeCatalog } from '../knowledge/knowledge-catalog';
import { logger } from '../observability/logger';
import { PatternMatcher, loadDefaultPatterns, mergePatternConfigs } from '../patterns/pattern-matcher';
import { TemplateValues, renderTemplate, templateValues } from '../text/template';
import { validateTenantFile } from './tenant-schema';
import {
  DEFAULT_THRESHOLDS,
  FollowupTable,
  PatternRuleConfig,
  TenantFile,
  TenantProfile,
  TenantTemplates,
  TenantThresholds,
} from './types';
import { loadYamlFile } from './yaml-file';

const log = logger.child({ component: 'tenant-loader' });

export const TENANT_ID_RE = /^[a-z0-9][a-z0-9_-]*$/;

export const DEFAULT_TEMPLATES: Readonly<TenantTemplates> = Object.freeze({
  fallback:
    'Det kan jag tyvärr inte svara säkert på här. Ring oss på {phone} eller mejla {email} så hjälper vi dig. ' +
    'Lämna gärna namn och telefonnummer så återkommer vi.',
  handoff:
    'Jag kopplar ditt ärende vidare till en handläggare på {company_name}. Vi hör av oss så snart vi kan. ' +
    'Är det brådskande, ring {phone}.',
  alreadyEscalated:
    'Ditt ärende ligger redan hos en handläggare på {company_name} och vi återkommer så snart vi kan. ' +
    'Är det brådskande, ring {phone}.',
  guarded: 'Det kan jag inte hjälpa till med. Har du frågor om ditt boende, ring {phone} eller mejla {email}.',
  collect: Object.freeze({
    property: 'Vilken adress och lägenhet gäller det?',
    phone: 'Vilket telefonnummer når vi dig på?',
    email: 'Vilken e-postadress kan vi nå dig på?',
    name: 'Vad heter du?',
  }),
});

/** Immutable, fully compiled view of one tenant. Replaced wholesale on reload. */
export interface TenantContext {
  readonly tenantId: string;
  readonly profile: Readonly<TenantProfile>;
  readonly values: TemplateValues;
  readonly thresholds: Readonly<TenantThresholds>;
  /** Rendered against the profile */
  readonly templates: Readonly<TenantTemplates>;
  readonly patterns: PatternMatcher;
  readonly catalog: KnowledgeCatalog;
  readonly escalation: EscalationEngine;
  readonly followups: Readonly<FollowupTable>;
  readonly lexicon: Lexicon;
  readonly loadedAt: number;
}

export interface BuildOptions {
  lexicon?: Lexicon;
  defaultPatterns?: readonly PatternRuleConfig[];
  now?: number;
}

function renderTemplates(file: TenantFile, values: TemplateValues): TenantTemplates {
  const raw: NonNullable<TenantFile['templates']> = file.templates ?? {};
  const where = (name: string) => `${file.tenantId} template ${name}`;
  return {
    fallback: renderTemplate(raw.fallback ?? DEFAULT_TEMPLATES.fallback, values, where('fallback')),
    handoff: renderTemplate(raw.handoff ?? DEFAULT_TEMPLATES.handoff, values, where('handoff')),
    alreadyEscalated: renderTemplate(
      raw.alreadyEscalated ?? DEFAULT_TEMPLATES.alreadyEscalated,
      values,
      where('alreadyEscalated'),
    ),
    guarded: renderTemplate(raw.guarded ?? DEFAULT_TEMPLATES.guarded, values, where('guarded')),
    collect: Object.freeze({ ...DEFAULT_TEMPLATES.collect, ...raw.collect }),
  };
}

/** Compile a validated tenant file. Throws ConfigurationError on semantic problems. */
export function buildTenantContext(file: TenantFile, options: BuildOptions = {}): TenantContext {
  const lexicon = options.lexicon ?? defaultLexicon();
  const values = templateValues(file.profile);
  const thresholds: TenantThresholds = Object.freeze({ ...DEFAULT_THRESHOLDS, ...file.thresholds });
  const templates = Object.freeze(renderTemplates(file, values));

  const patterns = PatternMatcher.compile(
    mergePatternConfigs(file.patterns ?? [], options.defaultPatterns ?? loadDefaultPatterns()),
    values,
  );
  const catalog = KnowledgeCatalog.build(file.knowledge ?? [], values, thresholds);

  const ruleIds = new Set<string>();
  for (const rule of file.escalationRules ?? []) {
    if (ruleIds.has(rule.id)) {
      throw new ConfigurationError(`Duplicate escalation rule id: ${rule.id}`, { tenantId: file.tenantId });
    }
    ruleIds.add(rule.id);
  }
  const escalation = EscalationEngine.compile(file.escalationRules ?? [], { thresholds, lexicon, values, templates });

  return Object.freeze({
    tenantId: file.tenantId,
    profile: Object.freeze({ ...file.profile, locations: [...file.profile.locations] }),
    values,
    thresholds,
    templates,
    patterns,
    catalog,
    escalation,
    followups: Object.freeze({ ...file.followups }),
    lexicon,
    loadedAt: options.now ?? Date.now(),
  });
}

export function tenantFilePath(configDir: string, tenantId: string): string {
  return path.join(configDir, `${tenantId}.yaml`);
}

/** Read, validate and compile `<configDir>/<tenantId>.yaml` */
export function loadTenantFile(filepath: string, options: BuildOptions = {}): TenantContext {
  const file = loadYamlFile(filepath, validateTenantFile);
  const expected = path.basename(filepath, path.extname(filepath));
  if (file.tenantId !== expected) {
    throw new ConfigurationError(`tenantId "${file.tenantId}" does not match file name ${path.basename(filepath)}`, {
      filepath,
    });
  }
  return buildTenantContext(file, options);
}

/**
 * Load every tenant file in a directory. Invalid files are logged and
 * skipped so one broken tenant does not take the others down.
 */
export function loadTenantDirectory(configDir: string, options: BuildOptions = {}): Map<string, TenantContext> {
  const tenants = new Map<string, TenantContext>();
  if (!fs.existsSync(configDir)) {
    log.warn({ configDir }, 'Tenant config directory not found');
    return tenants;
  }

  for (const name of fs.readdirSync(configDir).sort()) {
    if (!name.endsWith('.yaml')) continue;
    const filepath = path.join(configDir, name);
    try {
      const context = loadTenantFile(filepath, options);
      tenants.set(context.tenantId, context);
    } catch (err) {
      log.error({ err, filepath }, 'Skipping invalid tenant file');
    }
  }

  log.info({ tenants: [...tenants.keys()] }, 'Tenants loaded');
  return tenants;
}
