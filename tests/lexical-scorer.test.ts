import { describe, it, expect } from 'vitest';
import { LexicalScorer } from '@/services/lexical-scorer';
import { JAVA, PYTHON, TEAMWORK } from './helpers';

describe('LexicalScorer', () => {
  const scorer = new LexicalScorer([JAVA, TEAMWORK, PYTHON]);

  it('scores by distinct shared terms', () => {
    const top = scorer.topN('Java developer with strong communication', 3);

    expect(top.map((c) => c.record.id)).toEqual(['java-programming', 'teamwork-profile', 'python-programming']);
    expect(top.map((c) => c.score)).toEqual([
      { kind: 'lexical', sharedTerms: 1 },
      { kind: 'lexical', sharedTerms: 1 },
      { kind: 'lexical', sharedTerms: 0 },
    ]);
  });

  it('counts repeated query terms once', () => {
    const [first] = scorer.topN('python python python test', 1);
    expect(first.record.id).toBe('python-programming');
    expect(first.score).toEqual({ kind: 'lexical', sharedTerms: 2 });
  });

  it('matches category labels', () => {
    const [first] = scorer.topN('personality', 1);
    expect(first.record.id).toBe('teamwork-profile');
  });

  it('returns catalog order when nothing matches', () => {
    expect(scorer.topN('zzz', 2).map((c) => c.record.id)).toEqual(['java-programming', 'teamwork-profile']);
  });
});
