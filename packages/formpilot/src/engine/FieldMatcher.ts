/**
 * FieldMatcher: deterministic attribute-to-field assignment.
 *
 * Every (profile attribute, field) pair runs through a cascade of
 * strategies: name/id tokens, label, placeholder. Each strategy either
 * scores the pair or has no opinion; the pair's score is the best opinion,
 * subject to a kind-compatibility veto and a per-kind floor. Assignment is
 * greedy over all candidates in score order, so no field and no attribute
 * is used twice.
 */

import { flattenProfile, type AttributePath, type ProfileAttribute, type SemanticType } from '../profile/attributes';
import type { Profile } from '../profile/schema';
import type { EngineConfig } from '../config/matching';
import type {
  FieldDescriptor,
  FieldKind,
  FillPlan,
  FillPlanEntry,
  IncoercibleEntry,
  MatchCandidate,
  StrategyName,
} from './types';
import { isChoiceKind } from './types';
import { AliasScorer, degreeLevel, scoreOption } from './textMatch';
import { coerceValue } from './ValueCoercer';
import { FormPilotError, errorMessage } from './errors';
import { getLogger } from '../monitoring/logger';

// ── Kind compatibility ────────────────────────────────────────────────

const COMPATIBLE_KINDS: Record<SemanticType, ReadonlySet<FieldKind>> = {
  name: new Set(['text']),
  email: new Set(['email', 'text']),
  phone: new Set(['tel', 'text']),
  text: new Set(['text', 'textarea', 'singleSelect', 'radioGroup']),
  longText: new Set(['textarea', 'text']),
  date: new Set(['date', 'text']),
  degree: new Set(['text', 'singleSelect', 'radioGroup']),
  skillSet: new Set(['multiSelect', 'textarea', 'text']),
};

export function isKindCompatible(semanticType: SemanticType, kind: FieldKind): boolean {
  return COMPATIBLE_KINDS[semanticType].has(kind);
}

export interface BuildPlanOptions {
  /** Only required fields are planned; the rest come back unmatched. */
  requiredOnly?: boolean;
}

interface StrategyScore {
  strategy: StrategyName;
  score: number;
}

// ── FieldMatcher ──────────────────────────────────────────────────────

export class FieldMatcher {
  private logger = getLogger({ service: 'FieldMatcher' });
  private scorer: AliasScorer;

  constructor(private config: EngineConfig) {
    this.scorer = new AliasScorer(config.aliases);
  }

  /**
   * Score one pair, or null when the pair is vetoed, no strategy had an
   * opinion, or the score falls below the field kind's floor.
   */
  scoreCandidate(attribute: ProfileAttribute, descriptor: FieldDescriptor): MatchCandidate | null {
    if (!isKindCompatible(attribute.semanticType, descriptor.kind)) return null;

    const opinions = this.runStrategies(attribute.path, descriptor);
    if (opinions.length === 0) return null;

    if (isChoiceKind(descriptor.kind)) {
      const captioned = opinions.some((o) => o.strategy !== 'placeholder');
      if (!captioned || !this.optionsFit(attribute, descriptor)) return null;
    }

    // Opinions arrive in cascade order; strict > keeps the earlier strategy on ties.
    let best = opinions[0];
    for (const opinion of opinions) {
      if (opinion.score > best.score) best = opinion;
    }

    if (best.score < this.config.scoreFloors[descriptor.kind]) return null;

    return {
      profileAttributePath: attribute.path,
      fieldDescriptorId: descriptor.id,
      score: best.score,
      strategyName: best.strategy,
    };
  }

  /** Every surviving candidate, best first, in a fully deterministic order. */
  rankCandidates(attributes: ProfileAttribute[], descriptors: FieldDescriptor[]): MatchCandidate[] {
    const order = new Map(attributes.map((a) => [a.path, a.order]));
    const position = new Map(descriptors.map((d) => [d.id, d.index]));

    const candidates: MatchCandidate[] = [];
    for (const descriptor of descriptors) {
      for (const attribute of attributes) {
        const candidate = this.scoreCandidate(attribute, descriptor);
        if (candidate) candidates.push(candidate);
      }
    }

    return candidates.sort(
      (a, b) =>
        b.score - a.score ||
        (position.get(a.fieldDescriptorId) ?? 0) - (position.get(b.fieldDescriptorId) ?? 0) ||
        (order.get(a.profileAttributePath) ?? 0) - (order.get(b.profileAttributePath) ?? 0),
    );
  }

  buildPlan(profile: Profile, descriptors: FieldDescriptor[], options: BuildPlanOptions = {}): FillPlan {
    const attributes = flattenProfile(profile);
    const byPath = new Map(attributes.map((a) => [a.path, a]));
    const byId = new Map(descriptors.map((d) => [d.id, d]));
    const eligible = options.requiredOnly ? descriptors.filter((d) => d.required) : descriptors;

    const candidates = this.rankCandidates(attributes, eligible);

    const settled = new Map<string, FillPlanEntry>();
    const usedAttributes = new Set<AttributePath>();

    for (const candidate of candidates) {
      if (settled.has(candidate.fieldDescriptorId) || usedAttributes.has(candidate.profileAttributePath)) continue;

      const attribute = byPath.get(candidate.profileAttributePath);
      const descriptor = byId.get(candidate.fieldDescriptorId);
      if (!attribute || !descriptor) continue;

      try {
        const coercedValue = coerceValue(attribute, descriptor, this.config);
        settled.set(descriptor.id, {
          kind: 'assigned',
          fieldDescriptorId: descriptor.id,
          coercedValue,
          sourceAttributePath: attribute.path,
          score: candidate.score,
          strategyName: candidate.strategyName,
        });
        usedAttributes.add(attribute.path);
        this.logger.debug('Field assigned', {
          fieldId: descriptor.id,
          attribute: attribute.path,
          score: candidate.score,
          strategy: candidate.strategyName,
        });
      } catch (err) {
        // The field is settled as incoercible; the attribute may still fit another field.
        const entry: IncoercibleEntry = {
          kind: 'incoercible',
          fieldDescriptorId: descriptor.id,
          sourceAttributePath: attribute.path,
          errorCode: err instanceof FormPilotError ? err.code : 'incoercible_value',
          error: errorMessage(err),
        };
        settled.set(descriptor.id, entry);
        this.logger.warn('Best candidate could not be coerced', {
          fieldId: descriptor.id,
          attribute: attribute.path,
          errorCode: entry.errorCode,
        });
      }
    }

    const entries = descriptors.map((descriptor): FillPlanEntry => {
      const entry = settled.get(descriptor.id);
      if (entry) return entry;
      if (descriptor.required) {
        this.logger.warn('Required field unmatched', { fieldId: descriptor.id, label: descriptor.label });
      }
      return { kind: 'unmatched', fieldDescriptorId: descriptor.id };
    });

    const unassignedAttributes = attributes.map((a) => a.path).filter((path) => !usedAttributes.has(path));

    this.logger.info('Fill plan built', {
      fieldCount: descriptors.length,
      assigned: entries.filter((e) => e.kind === 'assigned').length,
      incoercible: entries.filter((e) => e.kind === 'incoercible').length,
      unmatched: entries.filter((e) => e.kind === 'unmatched').length,
      unassignedAttributes,
    });

    return {
      entries: entries.map((e) => Object.freeze(e)),
      unassignedAttributes,
      candidates,
    };
  }

  // ── Strategies ──────────────────────────────────────────────────────

  private runStrategies(path: AttributePath, descriptor: FieldDescriptor): StrategyScore[] {
    const opinions: StrategyScore[] = [];

    const byName = this.maxOf(this.scorer.scoreName(path, descriptor.name), this.scorer.scoreName(path, descriptor.domId));
    if (byName !== null) opinions.push({ strategy: 'name_token', score: byName });

    const byLabel = this.scorer.scoreCaption(path, descriptor.label, this.config.labelFloor);
    if (byLabel !== null) opinions.push({ strategy: 'label', score: byLabel });

    if (descriptor.placeholder) {
      const byPlaceholder = this.scorer.scoreCaption(path, descriptor.placeholder, this.config.labelFloor);
      if (byPlaceholder !== null) {
        opinions.push({ strategy: 'placeholder', score: Math.min(byPlaceholder, this.config.placeholderCeiling) });
      }
    }

    return opinions;
  }

  private maxOf(a: number | null, b: number | null): number | null {
    if (a === null) return b;
    if (b === null) return a;
    return Math.max(a, b);
  }

  /** A choice field is only a candidate when its options fit the attribute's domain. */
  private optionsFit(attribute: ProfileAttribute, descriptor: FieldDescriptor): boolean {
    if (attribute.semanticType === 'degree') {
      const levels = this.config.degreeLevels;
      return descriptor.options.some(
        (o) => degreeLevel(o.displayText, levels) !== null || degreeLevel(o.value, levels) !== null,
      );
    }
    return descriptor.options.some((o) =>
      attribute.values.some((v) => scoreOption(v, o) >= this.config.optionFloor),
    );
  }
}

/** Plan a run: score, resolve and coerce in one pass. */
export function buildFillPlan(
  profile: Profile,
  descriptors: FieldDescriptor[],
  config: EngineConfig,
  options: BuildPlanOptions = {},
): FillPlan {
  return new FieldMatcher(config).buildPlan(profile, descriptors, options);
}
