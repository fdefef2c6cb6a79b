import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
    CommentModerator,
    MISSING_TEXT,
    NEGATIVE_BLOCKED,
    afinnPolarity,
} from '../src/services/moderation.service.js';

// estimator stub that records what it was asked to score
function fixedPolarity(value: number) {
    const seen: string[] = [];
    const estimate = (text: string) => {
        seen.push(text);
        return value;
    };
    return { estimate, seen };
}

describe('COMMENT MODERATOR TESTS:', () => {
    describe('threshold', () => {
        it('should admit polarity exactly -0.3', () => {
            const { estimate } = fixedPolarity(-0.3);
            const result = new CommentModerator(estimate).moderate('meh');
            expect(result).to.deep.equal({ status: 'admitted', text: 'meh', polarity: -0.3 });
        });

        it('should reject polarity -0.31 as "Negative blocked"', () => {
            const { estimate } = fixedPolarity(-0.31);
            const result = new CommentModerator(estimate).moderate('ugh');
            expect(result).to.deep.equal({ status: 'rejected', message: NEGATIVE_BLOCKED, polarity: -0.31 });
        });

        it('should admit positive text', () => {
            const { estimate } = fixedPolarity(0.8);
            expect(new CommentModerator(estimate).moderate('wow').status).to.equal('admitted');
        });
    });

    describe('missing text', () => {
        it('should flag empty text without scoring it', () => {
            const { estimate, seen } = fixedPolarity(0);
            const result = new CommentModerator(estimate).moderate('');
            expect(result).to.deep.equal({ status: 'missing', message: MISSING_TEXT });
            expect(seen).to.deep.equal([]);
        });

        it('should treat whitespace-only and absent text as missing', () => {
            const { estimate, seen } = fixedPolarity(0);
            const moderator = new CommentModerator(estimate);
            expect(moderator.moderate('   ').status).to.equal('missing');
            expect(moderator.moderate(null).status).to.equal('missing');
            expect(moderator.moderate(undefined).status).to.equal('missing');
            expect(seen).to.have.length(0);
        });
    });

    describe('estimator failures', () => {
        it('should admit when the estimator throws', () => {
            const moderator = new CommentModerator(() => {
                throw new Error('unsupported script');
            });
            expect(moderator.moderate('テスト')).to.deep.equal({
                status: 'admitted',
                text: 'テスト',
                polarity: null,
            });
        });

        it('should admit when the estimator returns NaN', () => {
            const moderator = new CommentModerator(() => Number.NaN);
            expect(moderator.moderate('?').status).to.equal('admitted');
        });
    });

    describe('afinnPolarity()', () => {
        it('should score neutral text 0', () => {
            expect(afinnPolarity('a photo of a tree')).to.equal(0);
        });

        it('should average word scores and scale to [-1, 1]', () => {
            // love = +3
            expect(afinnPolarity('I love this photo')).to.be.closeTo(0.6, 1e-9);
            // hate = -3, terrible = -3
            expect(afinnPolarity('This is terrible, I hate it')).to.be.closeTo(-0.6, 1e-9);
        });

        it('should drive the default moderator', () => {
            const moderator = new CommentModerator();
            expect(moderator.moderate('What a beautiful shot').status).to.equal('admitted');
            expect(moderator.moderate('This is awful and I hate it')).to.deep.include({
                status: 'rejected',
                message: NEGATIVE_BLOCKED,
            });
        });
    });
});
