import { Classifier } from '../../src/classifier/classifier';
import { classifyIntent } from '../../src/classifier/intent-classifier';
import { compileLexicon, defaultLexicon } from '../../src/classifier/lexicon';
import { levelForScore, scoreSentiment, smoothSentiment } from '../../src/classifier/sentiment-analyzer';
import { ConfigurationError } from '../../src/errors';

const lexicon = defaultLexicon();

describe('classifyIntent', () => {
  it('recognises a fault report with full confidence', () => {
    const result = classifyIntent(lexicon, 'Vattenläcka i köket!');
    expect(result.intent).toBe('fault_report');
    expect(result.confidence).toBe(1);
  });

  it('damps confidence while the winning score is weak', () => {
    const result = classifyIntent(lexicon, 'Hej');
    expect(result.intent).toBe('greeting');
    expect(result.confidence).toBe(0.5);
  });

  it('returns unknown with zero confidence when nothing matches', () => {
    expect(classifyIntent(lexicon, 'Kan jag ha en studsmatta på gården?')).toEqual({
      intent: 'unknown',
      confidence: 0,
      scores: [],
    });
  });

  it('lets earlier user turns carry a terse follow-up', () => {
    const result = classifyIntent(lexicon, 'Ja, gärna', ['Har ni lediga lägenheter?']);
    expect(result.intent).toBe('rental_inquiry');
    expect(result.confidence).toBe(0.75);
  });

  it('weighs the current message above history', () => {
    const result = classifyIntent(lexicon, 'Vad kostar hyran?', ['Har ni lediga lägenheter?']);
    expect(result.intent).toBe('pricing_question');
  });

  it('breaks ties by declaration order', () => {
    // greeting and gratitude both score 1
    expect(classifyIntent(lexicon, 'hej tack').intent).toBe('greeting');
    expect(classifyIntent(lexicon, 'hej tack').confidence).toBe(0);
  });
});

describe('sentiment', () => {
  it('reads insults as angry', () => {
    expect(scoreSentiment(lexicon, 'Ni är helt värdelösa idioter!')).toEqual({ level: 'angry', score: 6 });
  });

  it('reads thanks as positive', () => {
    expect(scoreSentiment(lexicon, 'Tack, det var toppen')).toEqual({ level: 'positive', score: -2 });
  });

  it('turns a negated positive word negative', () => {
    expect(scoreSentiment(lexicon, 'Det är inte bra')).toEqual({ level: 'frustrated', score: 1 });
  });

  it('adds up frustration cues', () => {
    expect(scoreSentiment(lexicon, 'Varför fungerar det fortfarande inte?')).toEqual({
      level: 'frustrated',
      score: 2,
    });
  });

  it('maps scores to levels', () => {
    expect(levelForScore(3)).toBe('angry');
    expect(levelForScore(0.5)).toBe('neutral');
    expect(levelForScore(-1)).toBe('positive');
  });

  it('lets severity fall by at most one level per turn', () => {
    expect(smoothSentiment('positive', 'angry')).toBe('frustrated');
    expect(smoothSentiment('neutral', 'frustrated')).toBe('neutral');
    expect(smoothSentiment('angry', 'neutral')).toBe('angry');
    expect(smoothSentiment('positive', undefined)).toBe('positive');
  });
});

describe('Classifier', () => {
  it('combines intent with smoothed sentiment', () => {
    const result = new Classifier(lexicon).classify('Okej', [], 'angry');
    expect(result).toEqual({
      intent: 'unknown',
      confidence: 0,
      sentiment: 'frustrated',
      rawSentiment: 'neutral',
      sentimentScore: 0,
    });
  });
});

describe('compileLexicon', () => {
  const base = {
    intents: { greeting: { hej: 1 } },
    sentiment: { angry: [], frustrated: [], positive: ['bra'], negations: ['inte'], intensifiers: [] },
    lead: { bands: { '4': ['boka*'] }, intentFloors: {} },
    legal: [],
    faults: { urgency: {}, categories: {} },
  };

  it('rejects intents it does not know', () => {
    expect(() => compileLexicon({ ...base, intents: { smalltalk: { hej: 1 } } })).toThrow(ConfigurationError);
  });

  it('rejects lead bands outside 1..5', () => {
    expect(() => compileLexicon({ ...base, lead: { bands: { '7': ['x'] }, intentFloors: {} } })).toThrow(
      'Lead band must be 1..5, got 7',
    );
  });

  it('rejects multi-word positive terms', () => {
    expect(() =>
      compileLexicon({ ...base, sentiment: { ...base.sentiment, positive: ['mycket bra'] } }),
    ).toThrow(ConfigurationError);
  });
});
