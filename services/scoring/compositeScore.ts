import {
    SCORE_CATEGORIES,
    type CompositeScore,
    type Recommendation,
    type RecommendationThreshold,
    type ScoreCategory,
    type ScoreWeights,
} from '../../src/types/scoring';
import type { ScoringConfig } from '../../config/strategyConfig';
import { ConfigurationError, ScoringError } from '../utils/errors';

export const WEIGHT_EPSILON = 1e-6;

export const validateWeights = (weights: ScoreWeights, path = 'scoring.weights'): void => {
    let sum = 0;
    for (const category of SCORE_CATEGORIES) {
        const w = weights[category];
        if (typeof w !== 'number' || !Number.isFinite(w) || w < 0) {
            throw new ConfigurationError(`${path}.${category}`, `weight must be a non-negative number, got ${w}`);
        }
        sum += w;
    }
    if (Math.abs(sum - 1) > WEIGHT_EPSILON) {
        throw new ConfigurationError(path, `weights must sum to 1.0, got ${sum}`);
    }
};

/**
 * Thresholds must be strictly descending, inside [0, 100], end at 0 and use
 * each label once, so every score in [0, 100] maps to exactly one label.
 */
export const validateThresholds = (
    thresholds: readonly RecommendationThreshold[],
    path = 'scoring.thresholds'
): void => {
    if (thresholds.length === 0) {
        throw new ConfigurationError(path, 'at least one threshold is required');
    }
    const labels = new Set<Recommendation>();
    thresholds.forEach((t, i) => {
        if (!Number.isFinite(t.min) || t.min < 0 || t.min > 100) {
            throw new ConfigurationError(`${path}[${i}].min`, `must be within [0, 100], got ${t.min}`);
        }
        if (i > 0 && !(t.min < thresholds[i - 1].min)) {
            throw new ConfigurationError(`${path}[${i}].min`, 'thresholds must be strictly descending');
        }
        if (labels.has(t.label)) {
            throw new ConfigurationError(`${path}[${i}].label`, `duplicate label ${t.label}`);
        }
        labels.add(t.label);
    });
    if (thresholds[thresholds.length - 1].min !== 0) {
        throw new ConfigurationError(path, 'the last threshold must start at 0');
    }
};

export const recommend = (score: number, thresholds: readonly RecommendationThreshold[]): Recommendation => {
    for (const t of thresholds) {
        if (score >= t.min) return t.label;
    }
    return thresholds[thresholds.length - 1].label;
};

export type SubScores = Record<ScoreCategory, number | null>;

/**
 * composite = Σ w_i * score_i over the categories present, with the present
 * weights renormalised to sum to 1. The effective weights are disclosed.
 */
export const computeCompositeScore = (scores: SubScores, config: ScoringConfig): CompositeScore => {
    const present = SCORE_CATEGORIES.filter(c => scores[c] !== null);
    const missing = SCORE_CATEGORIES.filter(c => scores[c] === null);

    if (present.length === 0) {
        throw new ScoringError('composite', 'no category could be scored');
    }

    const presentWeight = present.reduce((sum, c) => sum + config.weights[c], 0);
    if (presentWeight <= 0) {
        throw new ScoringError('composite', `available categories (${present.join(', ')}) carry no weight`);
    }

    const effectiveWeights: Partial<ScoreWeights> = {};
    let composite = 0;
    for (const category of present) {
        const weight = config.weights[category] / presentWeight;
        effectiveWeights[category] = weight;
        composite += weight * (scores[category] ?? 0);
    }
    composite = Math.min(100, Math.max(0, composite));

    return {
        technical: scores.technical,
        fundamental: scores.fundamental,
        sentiment: scores.sentiment,
        composite,
        recommendation: recommend(composite, config.thresholds),
        effectiveWeights,
        missing,
        partial: missing.length > 0,
    };
};
