import { readFileSync } from 'node:fs';
import { logger } from '../logger.js';
import { isRecord, readPath } from '../utils/guards.js';
import { isEventKind } from '../types/index.js';
import type { AchievementRule, DomainEvent, EventKind, IncrementKind } from '../types/index.js';

const INCREMENT_KINDS: readonly IncrementKind[] = [
  'count', 'when', 'atLeast', 'atMost', 'sum', 'donationAtLeast', 'streak',
];

type Scalar = string | number | boolean;

function isIncrementKind(value: unknown): value is IncrementKind {
  return typeof value === 'string' && INCREMENT_KINDS.some(kind => kind === value);
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function scalarMap(value: unknown): Record<string, Scalar> | null {
  if (!isRecord(value)) return null;
  const result: Record<string, Scalar> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isScalar(entry)) return null;
    result[key] = entry;
  }
  return result;
}

function numberMap(value: unknown): Record<string, number> | null {
  if (!isRecord(value)) return null;
  const result: Record<string, number> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'number') return null;
    result[key.toUpperCase()] = entry;
  }
  return result;
}

/** Validate one rule entry; returns the rule or the reason it was rejected. */
export function parseAchievementRule(value: unknown): AchievementRule | string {
  if (!isRecord(value)) return 'entry is not an object';
  const { id, name, description, icon, trigger, threshold, increment } = value;
  if (typeof id !== 'string' || !id) return 'missing id';
  if (typeof name !== 'string') return `${id}: missing name`;
  if (!isEventKind(trigger)) return `${id}: unknown trigger ${String(trigger)}`;
  if (typeof threshold !== 'number' || !(threshold > 0)) return `${id}: threshold must be a positive number`;
  if (!isIncrementKind(increment)) return `${id}: unknown increment ${String(increment)}`;

  const rule: AchievementRule = {
    id,
    name,
    description: typeof description === 'string' ? description : '',
    icon: typeof icon === 'string' ? icon : '🏆',
    trigger,
    threshold,
    increment,
  };

  if (value.where !== undefined) {
    const where = scalarMap(value.where);
    if (!where) return `${id}: where must map paths to scalar values`;
    rule.where = where;
  }
  if (value.field !== undefined) {
    if (typeof value.field !== 'string') return `${id}: field must be a string`;
    rule.field = value.field;
  }
  if (value.value !== undefined) {
    if (!isScalar(value.value)) return `${id}: value must be a scalar`;
    rule.value = value.value;
  }

  switch (increment) {
    case 'when':
      if (!rule.field || rule.value === undefined) return `${id}: when needs field and value`;
      break;
    case 'atLeast':
    case 'atMost':
      if (!rule.field || typeof rule.value !== 'number') return `${id}: ${increment} needs field and numeric value`;
      break;
    case 'sum':
      if (!rule.field) return `${id}: sum needs field`;
      break;
    case 'donationAtLeast': {
      const minimums = numberMap(value.minimums);
      if (!minimums) return `${id}: donationAtLeast needs a minimums map`;
      rule.minimums = minimums;
      break;
    }
    case 'streak': {
      const resetOn = value.resetOn;
      if (!Array.isArray(resetOn) || !resetOn.every(isEventKind)) return `${id}: streak needs resetOn event kinds`;
      const kinds: EventKind[] = resetOn.filter(isEventKind);
      rule.resetOn = kinds;
      if (value.resetWhere !== undefined) {
        const resetWhere = scalarMap(value.resetWhere);
        if (!resetWhere) return `${id}: resetWhere must map paths to scalar values`;
        rule.resetWhere = resetWhere;
      }
      break;
    }
    case 'count':
      break;
  }

  return rule;
}

/**
 * Parse the `achievements` array of a rule document. Invalid and duplicate
 * entries are skipped with a warning.
 */
export function parseAchievementRules(document: unknown): AchievementRule[] {
  const entries = isRecord(document) ? document.achievements : document;
  if (!Array.isArray(entries)) {
    logger.warn('Achievements: rule document has no achievements array');
    return [];
  }
  const rules: AchievementRule[] = [];
  const seen = new Set<string>();
  for (const entry of entries) {
    const parsed = parseAchievementRule(entry);
    if (typeof parsed === 'string') {
      logger.warn(`Achievements: skipping rule (${parsed})`);
      continue;
    }
    if (seen.has(parsed.id)) {
      logger.warn(`Achievements: skipping duplicate rule ${parsed.id}`);
      continue;
    }
    seen.add(parsed.id);
    rules.push(parsed);
  }
  return rules;
}

/** Load the rule table from disk. Missing or unreadable file → no rules. */
export function loadAchievementRules(path: string): AchievementRule[] {
  try {
    const raw = readFileSync(path, 'utf-8');
    const rules = parseAchievementRules(JSON.parse(raw));
    logger.info(`Achievements: loaded ${rules.length} rules from ${path}`);
    return rules;
  } catch (err) {
    logger.error(`Achievements: failed to load rules from ${path}:`, err);
    return [];
  }
}

// ── Rule evaluation ────────────────────────────────────────────────────────

export function matchesWhere(event: DomainEvent, where: Record<string, Scalar> | undefined): boolean {
  if (!where) return true;
  return Object.entries(where).every(([path, expected]) => readPath(event, path) === expected);
}

function numericField(event: DomainEvent, field: string | undefined): number | null {
  if (!field) return null;
  const value = readPath(event, field);
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Amount a matching event adds to a rule's counter. `streak` rules are
 * handled by the tracker, which owns the running streak.
 */
export function incrementFor(rule: AchievementRule, event: DomainEvent): number {
  switch (rule.increment) {
    case 'count':
    case 'streak':
      return 1;
    case 'when':
      return rule.field !== undefined && readPath(event, rule.field) === rule.value ? 1 : 0;
    case 'atLeast': {
      const value = numericField(event, rule.field);
      return value !== null && typeof rule.value === 'number' && value >= rule.value ? 1 : 0;
    }
    case 'atMost': {
      const value = numericField(event, rule.field);
      return value !== null && typeof rule.value === 'number' && value <= rule.value ? 1 : 0;
    }
    case 'sum': {
      const value = numericField(event, rule.field);
      return value !== null && value > 0 ? value : 0;
    }
    case 'donationAtLeast': {
      if (event.kind !== 'donation' || !rule.minimums) return 0;
      const minimum = rule.minimums[event.currency.toUpperCase()];
      return minimum !== undefined && event.amount >= minimum ? 1 : 0;
    }
  }
}
