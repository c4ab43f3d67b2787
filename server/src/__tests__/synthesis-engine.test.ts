import { describe, it, expect, vi } from 'vitest';
import {
  FALLBACK_EXECUTIVE_SUMMARY,
  FALLBACK_RECOMMENDATIONS,
} from '../synthesis/engine.js';
import { ParseError } from '../synthesis/errors.js';
import type { NarrativeGenerator } from '../synthesis/narrative.js';
import type { ThemeTagger } from '../synthesis/theme-tagging.js';
import {
  FIXED_NOW,
  makeAdvisor,
  makeCapturingLogger,
  makeEngine,
  makeGeneratedDataset,
  makeSelf,
  makeWorkedExample,
} from './helpers/synthesis-fixtures.js';

describe('SynthesisEngine: worked example', () => {
  it('reconciles themes into the Johari quadrants and scores alignment', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const result = await makeEngine().run('session-1', selfResponses, advisorResponses);

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const { johariWindow, synthesis } = result;
    expect(johariWindow.openArena.themes).toEqual(['leadership']);
    expect(johariWindow.blindSpot.themes).toEqual(['mentoring']);
    expect(johariWindow.hiddenArena.themes).toEqual(['creativity']);
    expect(johariWindow.unknownArena.themes).toEqual([
      'strategic_thinking',
      'innovation',
      'change_management',
      'cross_cultural_communication',
    ]);
    expect(johariWindow.dominantQuadrant).toBe('unknownArena');
    expect(johariWindow.selfAwarenessScore).toBeCloseTo(1 / 6);
    expect(johariWindow.developmentPriority).toBeCloseTo(0.12);
    expect(synthesis.alignmentScore).toBeCloseTo(1 / 3);
  });

  it('emits leadership as a confirmed energising strength', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const result = await makeEngine().run('session-1', selfResponses, advisorResponses);
    if (!result.ok) throw new Error('expected a completed run');

    expect(result.synthesis.alignmentAreas).toHaveLength(1);
    const strength = result.synthesis.alignmentAreas[0];
    expect(strength.id).toBe('strength_leadership');
    expect(strength.confidence).toBeCloseTo(0.95);
    expect(strength.strategicImportance).toBe(5);
    expect(strength.supportingEvidence).toEqual([
      'Self: "I enjoy leading the team through product launches."',
      'Self: "Leading people is where I feel most useful."',
      'Advisor: "They run planning meetings with clarity."',
      'Advisor: "The team trusts their direction during launches."',
    ]);

    expect(result.fiveInsights.energisingStrengths.map((s) => s.id)).toEqual(['energising_leadership']);
    expect(result.fiveInsights.energisingStrengths[0].leverageability).toBe(5);
  });

  it('does not treat a single advisor mention of mentoring as a hidden strength', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const result = await makeEngine().run('session-1', selfResponses, advisorResponses);

    expect(result.synthesis.hiddenStrengths).toEqual([]);
    expect(result.synthesis.overestimatedAreas).toEqual([]);
    expect(result.synthesis.developmentOpportunities).toEqual([]);
    expect(result.synthesis.repositioningPotential).toEqual([]);
  });

  it('promotes mentoring once three credible advisors cite it', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const extra = [
      makeAdvisor({ id: 'a5', keyThemes: ['mentoring'], credibilityWeight: 0.9, text: 'Coaches new hires patiently.' }),
      makeAdvisor({ id: 'a6', keyThemes: ['mentoring'], credibilityWeight: 0.9, text: 'Always pairs with juniors.' }),
    ];
    const result = await makeEngine().run('session-1', selfResponses, [...advisorResponses, ...extra]);

    expect(result.synthesis.hiddenStrengths.map((i) => i.id)).toEqual(['blindspot_mentoring']);
    // credibility (0.8 + 0.9 + 0.9) / 3, three citations
    expect(result.synthesis.hiddenStrengths[0].confidence).toBeCloseTo(2.6 / 3);
    expect(result.synthesis.hiddenStrengths[0].strategicImportance).toBe(3);
  });

  it('assembles the framework, experiments, scores and metadata', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const result = await makeEngine().run('session-1', selfResponses, advisorResponses, {
      additionalContext: { cohort: 'spring' },
    });
    if (!result.ok) throw new Error('expected a completed run');

    const { synthesis, framework } = result;
    expect(synthesis.id).toBe('synthesis-1');
    expect(synthesis.sessionId).toBe('session-1');
    expect(synthesis.generatedAt).toBe(FIXED_NOW.toISOString());
    expect(synthesis.selfResponseIds).toEqual(['s1', 's2', 's3']);
    expect(synthesis.advisorResponseIds).toEqual(['a1', 'a2', 'a3', 'a4']);
    // 0.2·0.8 + 0.3·0.7 + 0.3·0.8 + 0.1·(7/20) + 0.1·(5/8) = 0.7075
    expect(synthesis.confidenceLevel).toBe('medium');

    expect(framework.threeTruths.truths.map((t) => t.kind)).toEqual(['energising_strength', 'identity_alignment']);
    expect(framework.threeTruths.confidenceScore).toBeCloseTo(0.9);
    expect(framework.twoTensions.tensions).toEqual([]);
    expect(framework.twoTensions.opportunityScore).toBe(0.5);
    expect(framework.oneExperiment.experiment?.id).toBe('experiment_general_visibility_leadership');

    expect(result.microExperiments.map((e) => e.id)).toEqual(['experiment_blind_spot_mentoring']);
    expect(synthesis.strategicRecommendations).toEqual([
      'Prioritise roles and projects that leverage your leadership; this is where you reach peak performance with sustained energy.',
      'Schedule regular feedback conversations to explore blind spot areas and increase self-awareness.',
      "Create more opportunities to showcase capabilities that others aren't yet aware of.",
      'Seek mentoring relationships and cross-functional project opportunities to broaden how others experience your work.',
    ]);

    expect(synthesis.metadata.processingStats).toEqual({
      themesAnalyzed: 3,
      evidencePoints: 4,
      synthesisComplexity: 0.75,
    });
    expect(result.durationMs).toBe(0);
    expect(synthesis.metadata.fiveInsights).toMatchObject({
      totalInsights: 1,
      balanceScore: 0,
      dominantCategory: 'energising',
      isWellBalanced: false,
    });
    expect(synthesis.metadata.degradedCollaborators).toEqual([]);
    expect(synthesis.metadata.additionalContext).toEqual({ cohort: 'spring' });
    expect(synthesis.metadata.fallback).toBeUndefined();
  });

  it('writes the executive summary from the alignment band and top strengths', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const synthesis = await makeEngine().generateSynthesis('session-1', selfResponses, advisorResponses);

    expect(synthesis.executiveSummary).toBe([
      'Your self-perception and external feedback reveal significant differences, highlighting substantial opportunities for development and better positioning.',
      '',
      'Your strongest energising capability is leadership, where high skill meets high energy and strong external recognition.',
      '',
      'This analysis synthesises 7 total responses (3 self-assessment, 4 advisor feedback) to create a comprehensive view of your career profile.',
    ].join('\n'));
  });
});

describe('SynthesisEngine: fallback', () => {
  it('returns the fixed fallback synthesis when self responses are empty', async () => {
    const { advisorResponses } = makeWorkedExample();
    const result = await makeEngine().run('session-2', [], advisorResponses);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('validation');

    const { synthesis } = result;
    expect(synthesis.alignmentScore).toBe(0.5);
    expect(synthesis.confidenceLevel).toBe('low');
    expect(synthesis.executiveSummary).toBe(FALLBACK_EXECUTIVE_SUMMARY);
    expect(synthesis.strategicRecommendations).toEqual([...FALLBACK_RECOMMENDATIONS]);
    expect(synthesis.alignmentAreas).toEqual([]);
    expect(synthesis.hiddenStrengths).toEqual([]);
    expect(synthesis.overestimatedAreas).toEqual([]);
    expect(synthesis.developmentOpportunities).toEqual([]);
    expect(synthesis.repositioningPotential).toEqual([]);
    expect(synthesis.advisorResponseIds).toEqual(['a1', 'a2', 'a3', 'a4']);
    expect(synthesis.metadata.fallback).toEqual({
      reason: 'validation',
      message: 'Both self and advisor responses are required',
    });
  });

  it('falls back when advisor responses are empty', async () => {
    const { selfResponses } = makeWorkedExample();
    const synthesis = await makeEngine().generateSynthesis('session-2', selfResponses, []);
    expect(synthesis.executiveSummary).toBe(FALLBACK_EXECUTIVE_SUMMARY);
  });

  it('converts unexpected exceptions into an internal-error fallback', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    let calls = 0;
    const engine = makeEngine({
      clock: () => {
        calls += 1;
        if (calls === 1) throw new Error('clock failure');
        return FIXED_NOW;
      },
    });

    const result = await engine.run('session-3', selfResponses, advisorResponses);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('internal');
    expect(result.error.message).toBe('clock failure');
    expect(result.synthesis.metadata.fallback).toEqual({ reason: 'internal', message: 'clock failure' });
  });
});

describe('SynthesisEngine: cancellation', () => {
  it('returns the cancelled fallback when the signal is already aborted', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const controller = new AbortController();
    controller.abort();

    const result = await makeEngine().run('session-4', selfResponses, advisorResponses, { signal: controller.signal });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('cancelled');
    expect(result.synthesis.alignmentAreas).toEqual([]);
  });

  it('discards partial work when cancelled during a collaborator call', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const controller = new AbortController();
    const tagger: ThemeTagger = {
      extractThemes: vi.fn(async () => {
        controller.abort();
        return ['leadership'];
      }),
    };
    const untagged = [...selfResponses, makeSelf({ id: 's4', keyThemes: [] })];

    const result = await makeEngine({ themeTagger: tagger })
      .run('session-4', untagged, advisorResponses, { signal: controller.signal });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('cancelled');
    expect(result.synthesis.metadata.degradedCollaborators).toEqual([]);
  });
});

describe('SynthesisEngine: collaborators', () => {
  it('tags only responses that arrive without themes', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const extractThemes = vi.fn(async () => ['leadership']);
    const untagged = makeSelf({ id: 's4', keyThemes: [], text: 'Running the weekly planning session.' });

    const result = await makeEngine({ themeTagger: { extractThemes } })
      .run('session-5', [...selfResponses, untagged], advisorResponses);

    expect(extractThemes).toHaveBeenCalledOnce();
    expect(extractThemes).toHaveBeenCalledWith('What kind of work gives you energy?', 'Running the weekly planning session.', expect.any(AbortSignal));
    // leadership now has 3 self + 3 advisor mentions
    expect(result.synthesis.alignmentAreas[0].confidence).toBeCloseTo(1);
  });

  it('keeps at most taggingConcurrency tagging calls in flight', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    let inFlight = 0;
    let peak = 0;
    const extractThemes = vi.fn(async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return ['leadership'];
    });
    const untaggedSelf = [1, 2, 3, 4, 5].map((n) => makeSelf({ id: `su${n}`, keyThemes: [] }));
    const untaggedAdvisor = [1, 2, 3, 4, 5].map((n) => makeAdvisor({ id: `au${n}`, keyThemes: [] }));

    const result = await makeEngine({ themeTagger: { extractThemes }, taggingConcurrency: 2 })
      .run('session-limit', [...selfResponses, ...untaggedSelf], [...advisorResponses, ...untaggedAdvisor]);

    expect(extractThemes).toHaveBeenCalledTimes(10);
    expect(peak).toBe(2);
    expect(result.synthesis.metadata.degradedCollaborators).toEqual([]);
  });

  it('falls back to keyword tagging when the tagger times out', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const hanging: ThemeTagger = { extractThemes: () => new Promise<string[]>(() => {}) };
    const withUntagged = [
      selfResponses[0],
      makeSelf({ id: 's2', domain: 'social', keyThemes: [], text: 'I coordinate release planning.' }),
      selfResponses[2],
    ];

    const result = await makeEngine({ themeTagger: hanging, collaboratorTimeoutMs: 20 })
      .run('session-6', withUntagged, advisorResponses);

    expect(result.ok).toBe(true);
    expect(result.synthesis.metadata.degradedCollaborators).toEqual([{
      collaborator: 'theme_tagger',
      operation: 'extract_themes:s2',
      reason: 'collaborator_timeout: extract_themes:s2 timed out after 20ms',
    }]);
    expect(result.synthesis.alignmentAreas.map((i) => i.id)).toEqual(['strength_leadership']);
  });

  it('retries transient tagger failures inside the time bound', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    let attempts = 0;
    const flaky: ThemeTagger = {
      extractThemes: async () => {
        attempts += 1;
        if (attempts === 1) throw Object.assign(new Error('overloaded'), { status: 529 });
        return ['leadership'];
      },
    };
    const untagged = makeSelf({ id: 's4', keyThemes: [] });

    const result = await makeEngine({ themeTagger: flaky })
      .run('session-7', [...selfResponses, untagged], advisorResponses);

    expect(attempts).toBe(2);
    expect(result.synthesis.metadata.degradedCollaborators).toEqual([]);
  });

  it('keeps template prose for a section whose narrative fails to parse', async () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const generator: NarrativeGenerator = {
      generateNarrative: async (request) => {
        if (request.kind === 'executive_summary') throw new ParseError('Narrative writer returned no usable narrative');
        return `custom ${request.kind}`;
      },
    };

    const result = await makeEngine({ narrativeGenerator: generator })
      .run('session-8', selfResponses, advisorResponses);
    if (!result.ok) throw new Error('expected a completed run');

    const template = await makeEngine().generateSynthesis('session-8', selfResponses, advisorResponses);
    expect(result.synthesis.executiveSummary).toBe(template.executiveSummary);
    expect(result.fiveInsights.executiveSummary).toBe('custom five_insights_summary');
    expect(result.framework.threeTruths.narrative).toBe('custom truths');
    expect(result.framework.oneExperiment.narrative).toBe('custom experiment');
    expect(result.synthesis.metadata.degradedCollaborators).toEqual([{
      collaborator: 'narrative_generator',
      operation: 'generate_narrative:executive_summary',
      reason: 'parse: Narrative writer returned no usable narrative',
    }]);
  });
});

describe('SynthesisEngine: logging', () => {
  it('logs phase transitions and a limited-coverage warning with the session id', async () => {
    const { logger, lines } = makeCapturingLogger();
    const selfResponses = [
      makeSelf({ id: 's1', keyThemes: ['leadership'] }),
      makeSelf({ id: 's2', keyThemes: ['leadership'] }),
    ];
    const advisorResponses = [makeAdvisor({ id: 'a1', keyThemes: ['leadership'] })];

    await makeEngine({ logger }).run('session-9', selfResponses, advisorResponses);

    const entries = lines.map((line) => JSON.parse(line));
    expect(entries.filter((e) => e.msg === 'Synthesis phase').map((e) => e.phase))
      .toEqual(['validating', 'computing', 'assembling', 'done']);
    expect(entries.every((e) => e.sessionId === 'session-9')).toBe(true);
    expect(entries.find((e) => e.msg === 'Limited domain coverage; insights may be narrow'))
      .toMatchObject({ level: 40, selfDomains: 1, advisorDomains: 1 });
  });

  it('logs failed and fallback_assembled for an invalid run', async () => {
    const { logger, lines } = makeCapturingLogger();
    await makeEngine({ logger }).run('session-10', [], []);

    const phases = lines.map((line) => JSON.parse(line)).filter((e) => e.msg === 'Synthesis phase').map((e) => e.phase);
    expect(phases).toEqual(['validating', 'failed', 'fallback_assembled']);
  });
});

describe('SynthesisEngine: properties', () => {
  const seeds = [3, 17, 42, 101, 256, 999, 2024, 31337];

  it('keeps scores and confidences within [0, 1]', async () => {
    for (const seed of seeds) {
      const { selfResponses, advisorResponses } = makeGeneratedDataset(seed);
      const result = await makeEngine().run(`prop-${seed}`, selfResponses, advisorResponses);
      const s = result.synthesis;
      expect(s.alignmentScore).toBeGreaterThanOrEqual(0);
      expect(s.alignmentScore).toBeLessThanOrEqual(1);
      const insights = [
        ...s.alignmentAreas,
        ...s.hiddenStrengths,
        ...s.overestimatedAreas,
        ...s.developmentOpportunities,
        ...s.repositioningPotential,
      ];
      for (const insight of insights) {
        expect(insight.confidence).toBeGreaterThanOrEqual(0);
        expect(insight.confidence).toBeLessThanOrEqual(1);
        expect(insight.strategicImportance).toBeGreaterThanOrEqual(1);
        expect(insight.strategicImportance).toBeLessThanOrEqual(5);
      }
    }
  });

  it('only references themes present in the input', async () => {
    for (const seed of seeds) {
      const { selfResponses, advisorResponses } = makeGeneratedDataset(seed);
      const known = new Set([...selfResponses, ...advisorResponses].flatMap((r) => r.keyThemes));
      const s = await makeEngine().generateSynthesis(`prop-${seed}`, selfResponses, advisorResponses);
      const related = [
        ...s.alignmentAreas,
        ...s.hiddenStrengths,
        ...s.overestimatedAreas,
        ...s.developmentOpportunities,
        ...s.repositioningPotential,
      ].flatMap((i) => i.relatedThemes);
      for (const theme of related) {
        expect(known.has(theme)).toBe(true);
      }
    }
  });

  it('never places a theme in the open arena and the blind spot or hidden arena', async () => {
    for (const seed of seeds) {
      const { selfResponses, advisorResponses } = makeGeneratedDataset(seed);
      const result = await makeEngine().run(`prop-${seed}`, selfResponses, advisorResponses);
      if (!result.ok) throw new Error('expected a completed run');
      const open = new Set(result.johariWindow.openArena.themes);
      expect(result.johariWindow.blindSpot.themes.filter((t) => open.has(t))).toEqual([]);
      expect(result.johariWindow.hiddenArena.themes.filter((t) => open.has(t))).toEqual([]);
    }
  });

  it('produces identical output for identical input', async () => {
    for (const seed of seeds.slice(0, 3)) {
      const { selfResponses, advisorResponses } = makeGeneratedDataset(seed);
      const first = await makeEngine().run(`prop-${seed}`, selfResponses, advisorResponses);
      const second = await makeEngine().run(`prop-${seed}`, selfResponses, advisorResponses);
      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    }
  });

  it('differs only in id and generatedAt when the clock runs at different rates', async () => {
    const steppingClock = (stepMs: number) => {
      let now = FIXED_NOW.getTime();
      return () => {
        now += stepMs;
        return new Date(now);
      };
    };
    let counter = 0;
    const freshIds = () => `synthesis-${++counter}`;
    const { selfResponses, advisorResponses } = makeGeneratedDataset(42);

    const fast = await makeEngine({ clock: steppingClock(3), idGenerator: freshIds })
      .run('session-rate', selfResponses, advisorResponses);
    const slow = await makeEngine({ clock: steppingClock(7), idGenerator: freshIds })
      .run('session-rate', selfResponses, advisorResponses);
    if (!fast.ok || !slow.ok) throw new Error('expected completed runs');

    expect(fast.durationMs).toBe(3);
    expect(slow.durationMs).toBe(7);
    expect(fast.synthesis.id).not.toBe(slow.synthesis.id);
    expect(fast.synthesis.generatedAt).not.toBe(slow.synthesis.generatedAt);

    const { id: _fastId, generatedAt: _fastAt, ...fastRest } = fast.synthesis;
    const { id: _slowId, generatedAt: _slowAt, ...slowRest } = slow.synthesis;
    expect(fastRest).toEqual(slowRest);
  });
});
