/**
 * Tests for the confidence-routed assistant graph
 */

import { describe, it, expect } from 'vitest';
import { decide, PROCESSING_INSTRUCTION, runAssistant } from '../features/assistant/index.js';
import type { ExecutableStepId } from '../core/workflow/index.js';
import { createScriptedClient, type ScriptedReply } from './helpers/scripted-client.js';

/** Returns 1000, 3500, 6000, ... */
function steppedClock(): () => number {
  let time = 1000;
  return () => {
    const value = time;
    time += 2500;
    return value;
  };
}

async function assist(input: string, replies: ScriptedReply[], extra: { context?: string; maxRetries?: number; maxPasses?: number } = {}) {
  const client = createScriptedClient(replies);
  const steps: ExecutableStepId[] = [];
  const result = await runAssistant(
    input,
    extra.context ?? null,
    { client, now: steppedClock(), maxRetries: extra.maxRetries, maxPasses: extra.maxPasses },
    {
      observe: (engine) => {
        engine.on('step:start', (step) => {
          steps.push(step);
        });
      },
    },
  );
  return { client, steps, result };
}

describe('decide', () => {
  it('should classify by confidence first, then by keywords', () => {
    expect(decide('please help', 0.85)).toBe('high_confidence');
    expect(decide('I need HELP', 0.5)).toBe('needs_assistance');
    expect(decide('a quick question', 0.8)).toBe('needs_assistance');
    expect(decide('tell me a fact', 0.5)).toBe('standard_processing');
  });
});

describe('runAssistant', () => {
  it('should finalize directly on a confident answer', async () => {
    const { client, steps, result } = await assist('Capital of France?', ['{"answer":"Paris","confidence":0.9}']);

    expect(steps).toEqual(['start', 'generate', 'finalize']);
    expect(result).toEqual({
      result: 'Paris',
      confidence: 0.9,
      decision: null,
      retryCount: 0,
      executionTime: 2.5,
      messages: [
        'You are a helpful AI assistant processing user requests through a step-by-step workflow.',
        'Capital of France?',
        '{"answer":"Paris","confidence":0.9}',
        'Final result: Paris\nExecution time: 2.50s',
      ],
    });
    expect(client.requests[0]?.system).toBe(PROCESSING_INSTRUCTION);
    expect(client.requests[0]?.forceJson).toBe(true);
  });

  it('should append context to the user turn', async () => {
    const { client } = await assist('Summarize it', ['{"answer":"Short","confidence":1}'], { context: 'a long memo' });

    expect(client.requests[0]?.messages[1]?.content).toBe('Summarize it\n\nContext: a long memo');
  });

  it('should route a low-confidence answer through the decision and ask again', async () => {
    const { client, steps, result } = await assist('Can you help me plan a trip?', [
      '{"answer":"Go somewhere","confidence":0.5}',
      '{"answer":"Visit Lisbon in spring","confidence":0.75}',
    ]);

    expect(steps).toEqual(['start', 'generate', 'aggregate_partial', 'generate', 'finalize']);
    expect(result.decision).toBe('needs_assistance');
    expect(result.result).toBe('Visit Lisbon in spring');
    expect(result.confidence).toBe(0.75);
    expect(client.requests[1]?.messages.at(-1)?.content)
      .toBe('This request needs more assistance. Give a more complete answer and reassess your confidence.');
  });

  it('should stop after the maximum number of passes', async () => {
    const { steps, result } = await assist(
      'tell me a fact',
      ['{"answer":"One","confidence":0.3}', '{"answer":"Two","confidence":0.4}'],
      { maxPasses: 2 },
    );

    expect(steps).toEqual(['start', 'generate', 'aggregate_partial', 'generate', 'aggregate_partial', 'finalize']);
    expect(result.decision).toBe('standard_processing');
    expect(result.result).toBe('Two');
  });

  it('should retry after an unusable reply', async () => {
    const { client, steps, result } = await assist('Capital of Spain?', [
      'Madrid, definitely',
      '{"answer":"Madrid","confidence":0.95}',
    ]);

    expect(steps).toEqual(['start', 'generate', 'error_handle', 'generate', 'finalize']);
    expect(result.retryCount).toBe(1);
    expect(result.result).toBe('Madrid');
    expect(result.messages[3]).toMatch(/^An error occurred: Invalid processing response: .*\. Retry count: 0$/);
    expect(client.requests[1]?.messages.at(-1)?.content).toBe('Reconsider your answer and reassess your confidence.');
  });

  it('should report schema violations in the error note', async () => {
    const { result } = await assist('Capital of Italy?', [
      '{"answer":"Rome","confidence":7}',
      '{"answer":"Rome","confidence":0.9}',
    ]);

    expect(result.messages[3]).toMatch(/^An error occurred: Invalid processing response: confidence: /);
  });

  it('should fail once the retry ceiling is reached', async () => {
    await expect(assist('anything', ['nope', 'still nope'], { maxRetries: 1 }))
      .rejects.toThrow(/^Max retries \(1\) exceeded: Invalid processing response: /);
  });
});
