/**
 * Synthesis Tests
 *
 * The 0/1/many completed-subtask branches, preamble stripping, and the
 * content-loss diagnostic.
 */

import { describe, it, expect } from 'vitest';
import { ResearchPlan } from '../plan.js';
import {
  isContentLossSuspected,
  NOTHING_COMPLETED_MESSAGE,
  synthesize,
  synthesizeWithDiagnostics,
} from '../synthesis.js';
import { FakeCritic, spec } from './helpers/fake-roles.js';

function twoDonePlan(): ResearchPlan {
  const plan = ResearchPlan.fromSpecs('Compare A and B', [spec(1, 'Research A'), spec(2, 'Research B')], '');
  plan.getSubtask(1)?.complete('A is fast.', 8);
  plan.getSubtask(2)?.complete('B is cheap.', 7);
  return plan;
}

describe('synthesize', () => {
  it('returns the fixed message without calling the Critic when nothing completed', async () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'Q1'), spec(2, 'Q2')], '');
    const critic = new FakeCritic(() => 'unused');

    expect(await synthesize(plan, critic)).toBe(NOTHING_COMPLETED_MESSAGE);
    expect(critic.calls).toHaveLength(0);
  });

  it('returns a single completed subtask verbatim', async () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'Q1'), spec(2, 'Q2', [1, 2])], '');
    plan.getSubtask(1)?.complete('  Only findings, untouched.\n', 6);
    const critic = new FakeCritic(() => 'unused');

    const outcome = await synthesizeWithDiagnostics(plan, critic);

    expect(outcome.text).toBe('  Only findings, untouched.\n');
    expect(outcome.criticCalled).toBe(false);
    expect(critic.calls).toHaveLength(0);
  });

  it('asks the Critic to combine several subtasks and strips its JSON preamble', async () => {
    const critic = new FakeCritic(() => '```json\n{"isSatisfactory": true, "qualityScore": 8}\n```\n\n# Report\n\nCombined.');

    const outcome = await synthesizeWithDiagnostics(twoDonePlan(), critic);

    expect(outcome.text).toBe('# Report\n\nCombined.');
    expect(outcome.criticCalled).toBe(true);
    expect(critic.modes).toEqual(['synthesis']);
    const prompt = critic.calls[0].prompt;
    expect(prompt).toContain('## Original Question\nCompare A and B');
    expect(prompt).toContain('## Research Findings (from 2 subtasks)\n## Subtask 1: Research A\n\nA is fast.\n\n---\n\n## Subtask 2: Research B\n\nB is cheap.\n');
  });

  it('keeps a Critic answer that has no JSON preamble', async () => {
    const critic = new FakeCritic(() => '# Report\nNo preamble here.');
    const outcome = await synthesizeWithDiagnostics(twoDonePlan(), critic);

    expect(outcome.text).toBe('# Report\nNo preamble here.');
    expect(outcome.contentLossSuspected).toBe(false);
  });

  it('falls back to the raw answer when only JSON came back', async () => {
    const raw = '{"isSatisfactory": true, "qualityScore": 8}';
    const outcome = await synthesizeWithDiagnostics(twoDonePlan(), new FakeCritic(() => raw));
    expect(outcome.text).toBe(raw);
  });

  it('flags a large answer whose extracted report is under half its size', async () => {
    const raw = `{"reasoning": "${'x'.repeat(1500)}"}\nShort report.`;
    const outcome = await synthesizeWithDiagnostics(twoDonePlan(), new FakeCritic(() => raw));

    expect(outcome.text).toBe('Short report.');
    expect(outcome.rawBytes).toBe(1531);
    expect(outcome.extractedBytes).toBe(13);
    expect(outcome.contentLossSuspected).toBe(true);
  });

  it('measures sizes in UTF-8 bytes', async () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'Q1')], '');
    plan.getSubtask(1)?.complete('café', 7);

    const outcome = await synthesizeWithDiagnostics(plan, new FakeCritic(() => 'unused'));
    expect(outcome.rawBytes).toBe(5);
    expect(outcome.extractedBytes).toBe(5);
  });
});

describe('isContentLossSuspected', () => {
  it('ignores small responses', () => {
    expect(isContentLossSuspected(1000, 0)).toBe(false);
  });

  it('flags less than half retained', () => {
    expect(isContentLossSuspected(1001, 500)).toBe(true);
  });

  it('accepts half or more retained', () => {
    expect(isContentLossSuspected(1001, 501)).toBe(false);
  });
});
