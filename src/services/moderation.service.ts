import Sentiment from 'sentiment';
import type { FastifyBaseLogger } from 'fastify';

/**========================================================================
 **                          COMMENT MODERATOR
 *? text -> admitted | missing | rejected
 *? polarity comes from a pluggable estimator on a [-1, 1] scale
 *========================================================================**/

export const NEGATIVE_POLARITY_LIMIT = -0.3;
export const NEGATIVE_BLOCKED = 'Negative blocked';
export const MISSING_TEXT = 'Missing comment text';

export type PolarityEstimator = (text: string) => number;

export type ModerationResult =
    | { status: 'admitted'; text: string; polarity: number | null }
    | { status: 'missing'; message: typeof MISSING_TEXT }
    | { status: 'rejected'; message: typeof NEGATIVE_BLOCKED; polarity: number };

// AFINN word scores run -5..5: average the scored words, scale to -1..1
const AFINN_MAX = 5;
const analyzer = new Sentiment();

export function afinnPolarity(text: string): number {
    const { calculation } = analyzer.analyze(text);
    const scores = calculation.flatMap(entry => Object.values(entry));
    if (scores.length === 0) return 0;

    const mean = scores.reduce((sum, score) => sum + score, 0) / scores.length;
    return Math.max(-1, Math.min(1, mean / AFINN_MAX));
}

export class CommentModerator {
    constructor(
        private estimate: PolarityEstimator = afinnPolarity,
        private log?: FastifyBaseLogger
    ) {}

    moderate(text: string | null | undefined): ModerationResult {
        if (typeof text !== 'string' || text.trim() === '') {
            return { status: 'missing', message: MISSING_TEXT };
        }

        let polarity: number;
        try {
            polarity = this.estimate(text);
        } catch (err) {
            // estimator gaps must not eat legitimate comments: admit
            this.log?.warn({ err }, 'Sentiment estimator failed; admitting comment');
            return { status: 'admitted', text, polarity: null };
        }

        if (Number.isNaN(polarity)) {
            this.log?.warn('Sentiment estimator returned NaN; admitting comment');
            return { status: 'admitted', text, polarity: null };
        }

        if (polarity < NEGATIVE_POLARITY_LIMIT) {
            return { status: 'rejected', message: NEGATIVE_BLOCKED, polarity };
        }
        return { status: 'admitted', text, polarity };
    }
}
