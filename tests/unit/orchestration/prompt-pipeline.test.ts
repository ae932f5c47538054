/**
 * Prompt Pipeline - Unit Tests
 *
 * Uses a scripted backend so the prompt sent and the text returned can be
 * checked exactly.
 */

import { describe, it, expect } from 'vitest';
import { PipelineCore } from '../../../src/orchestration/pipeline-core.js';
import { PromptPipeline } from '../../../src/orchestration/prompt-pipeline.js';
import { SeededRandom } from '../../../src/mock/seeded-random.js';
import { BackendTransportError, isErrorResponse } from '../../../src/shared/errors.js';
import { ScriptedBackend, loadTestSettings } from '../../setup.js';

const HOME_EXTRAS = [
  '--- Relevant Offers ---',
  "From topic 'home_financing':",
  '- FlexHome fixed rate loan with no arrangement fee',
  '- Free property valuation for first-time buyers',
  '- Cashback of 500 on completion for remortgages',
  '',
  '--- Related Documents & Links ---',
  "From topic 'home_financing':",
  '- Home Loan Product Guide (intranet: /docs/home-loan-guide)',
  '- Affordability Checklist (intranet: /docs/affordability)',
  '- Remortgage FAQ (intranet: /docs/remortgage-faq)',
].join('\n');

describe('PromptPipeline', () => {
  const core = new PipelineCore(loadTestSettings(), { random: new SeededRandom(7) });

  it('prepares keywords, retrieval, skill and prompt', () => {
    const pipeline = new PromptPipeline(core, new ScriptedBackend([]));
    const prepared = pipeline.prepare('user005', 'Tell me about mortgage options');

    expect(prepared.keywords).toEqual(['mortgage', 'options']);
    expect(prepared.retrieval.matchedTopics).toEqual(['home_financing']);
    expect(prepared.skill.tier).toBe('EXPERT');
    expect(prepared.envelope.sections.map((s) => s.kind)).toEqual([
      'persona',
      'skill-guidance',
      'context',
      'restrictions',
    ]);
    expect(prepared.envelope.sections[1].text).toBe(
      '--- Skill Level Guidance ---\nBe concise and precise. Use specialist terminology and skip introductory explanations.'
    );
  });

  it('sends the assembled prompt and appends offers and docs', async () => {
    const backend = new ScriptedBackend(['Here is an answer.']);
    const pipeline = new PromptPipeline(core, backend, { model: 'test-model' });

    const result = await pipeline.processPromptRequest('user001', 'Tell me about mortgage options');

    expect(result).toBe(`Here is an answer.\n\n${HOME_EXTRAS}`);
    expect(backend.requests).toHaveLength(1);
    expect(backend.requests[0]).toMatchObject({
      model: 'test-model',
      userPrompt: 'Tell me about mortgage options',
      params: { temperature: 0.5, maxTokens: 450 },
    });
    expect(backend.requests[0].systemPrompt).toContain('Only answer questions related to home financing.');
  });

  it('returns the response unchanged when nothing was retrieved', async () => {
    const pipeline = new PromptPipeline(core, new ScriptedBackend(['Enjoy!']));

    expect(await pipeline.processPromptRequest('user002', 'Plan a picnic')).toBe('Enjoy!');
  });

  it('turns backend failures into an error string', async () => {
    const backend = new ScriptedBackend([new BackendTransportError('scripted', 'timeout')]);
    const pipeline = new PromptPipeline(core, backend);

    const result = await pipeline.processPromptRequest('user001', 'Tell me about mortgage options');

    expect(result).toBe(
      'Error: Could not process request due to LLM communication failure: scripted request failed: timeout'
    );
    expect(isErrorResponse(result)).toBe(true);
  });

  it('rejects an empty prompt without calling the backend', async () => {
    const backend = new ScriptedBackend(['unused']);
    const pipeline = new PromptPipeline(core, backend);

    expect(await pipeline.processPromptRequest('user001', '   ')).toBe('Error: Prompt must not be empty.');
    expect(backend.requests).toHaveLength(0);
  });
});
