import Ajv from 'ajv';
import { INTENTS, PRIORITIES, SENTIMENT_LEVELS, FAULT_URGENCIES, PatternRuleConfig, TenantFile } from './types';

const ajv = new Ajv({ allErrors: true });

const stringList = { type: 'array', items: { type: 'string', minLength: 1 } };

export const patternRuleSchema = {
  type: 'object',
  required: ['category', 'intent', 'response'],
  additionalProperties: false,
  properties: {
    category: { type: 'string', minLength: 1 },
    intent: { type: 'string', enum: [...INTENTS] },
    priority: { type: 'string', enum: [...PRIORITIES] },
    emergency: { type: 'boolean' },
    regex: { type: 'string', minLength: 1 },
    keywords: { ...stringList, minItems: 1 },
    response: { type: 'string', minLength: 1 },
    confidence: { type: 'number', minimum: 0, maximum: 1 },
    leadScoreHint: { type: 'integer', minimum: 1, maximum: 5 },
  },
  anyOf: [
    { type: 'object', required: ['regex'] },
    { type: 'object', required: ['keywords'] },
  ],
};

const escalationRuleSchema = {
  type: 'object',
  required: ['id', 'trigger', 'priority'],
  additionalProperties: false,
  properties: {
    id: { type: 'string', minLength: 1 },
    priority: { type: 'string', enum: [...PRIORITIES] },
    autoEscalate: { type: 'boolean', default: true },
    notifyTargets: { ...stringList, default: [] },
    replyTemplate: { type: 'string', minLength: 1 },
    trigger: {
      type: 'object',
      additionalProperties: false,
      minProperties: 1,
      properties: {
        keywords: { ...stringList, minItems: 1 },
        sentimentAtLeast: { type: 'string', enum: [...SENTIMENT_LEVELS] },
        consecutiveTurns: { type: 'integer', minimum: 1 },
        turnCountAbove: { type: 'integer', minimum: 0 },
        leadScoreAtLeast: { type: 'integer', minimum: 1, maximum: 5 },
        categories: { ...stringList, minItems: 1 },
        urgencyAtLeast: { type: 'string', enum: [...FAULT_URGENCIES] },
      },
    },
  },
};

const knowledgeEntrySchema = {
  type: 'object',
  required: ['id', 'question', 'answer', 'keywords'],
  additionalProperties: false,
  properties: {
    id: { type: 'string', minLength: 1 },
    question: { type: 'string', minLength: 1 },
    answer: { type: 'string', minLength: 1 },
    keywords: stringList,
    embedding: { type: 'array', items: { type: 'number' }, minItems: 1 },
  },
};

export const tenantFileSchema = {
  type: 'object',
  required: ['tenantId', 'profile'],
  additionalProperties: false,
  properties: {
    tenantId: { type: 'string', pattern: '^[a-z0-9][a-z0-9_-]*$' },
    profile: {
      type: 'object',
      required: ['companyName', 'phone', 'email', 'businessHours', 'locations'],
      additionalProperties: false,
      properties: {
        companyName: { type: 'string', minLength: 1 },
        phone: { type: 'string', minLength: 1 },
        email: { type: 'string', minLength: 3 },
        website: { type: 'string' },
        businessHours: { type: 'string', minLength: 1 },
        locations: stringList,
        emergencyPhone: { type: 'string', minLength: 1 },
        bookingLink: { type: 'string' },
      },
    },
    thresholds: {
      type: 'object',
      additionalProperties: false,
      properties: {
        confidenceFloor: { type: 'number', minimum: 0, maximum: 1 },
        maxConversationTurns: { type: 'integer', minimum: 1 },
        angryTurnsToEscalate: { type: 'integer', minimum: 1 },
        leadNotifyThreshold: { type: 'integer', minimum: 1, maximum: 5 },
        leadEscalationCeiling: { type: 'integer', minimum: 1, maximum: 5 },
        semanticThreshold: { type: 'number', minimum: 0, maximum: 1 },
        minKeywordOverlap: { type: 'number', minimum: 0, maximum: 1 },
      },
    },
    templates: {
      type: 'object',
      additionalProperties: false,
      properties: {
        fallback: { type: 'string', minLength: 1 },
        handoff: { type: 'string', minLength: 1 },
        alreadyEscalated: { type: 'string', minLength: 1 },
        guarded: { type: 'string', minLength: 1 },
        collect: {
          type: 'object',
          additionalProperties: false,
          properties: {
            property: { type: 'string', minLength: 1 },
            phone: { type: 'string', minLength: 1 },
            email: { type: 'string', minLength: 1 },
            name: { type: 'string', minLength: 1 },
          },
        },
      },
    },
    patterns: { type: 'array', items: patternRuleSchema },
    escalationRules: { type: 'array', items: escalationRuleSchema },
    knowledge: { type: 'array', items: knowledgeEntrySchema },
    followups: {
      type: 'object',
      additionalProperties: { type: 'array', items: { type: 'string', minLength: 1 }, maxItems: 4 },
    },
  },
};

export const patternsFileSchema = {
  type: 'object',
  required: ['patterns'],
  additionalProperties: false,
  properties: {
    patterns: { type: 'array', items: patternRuleSchema },
  },
};

// useDefaults fills autoEscalate/notifyTargets on rules
const ajvWithDefaults = new Ajv({ allErrors: true, useDefaults: true });

export const validateTenantFile = ajvWithDefaults.compile<TenantFile>(tenantFileSchema);
export const validatePatternsFile = ajv.compile<{ patterns: PatternRuleConfig[] }>(patternsFileSchema);
