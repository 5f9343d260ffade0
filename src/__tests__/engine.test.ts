/**
 * Tests for WorkflowEngine: step order, retry ceiling, iteration limit
 * and definition checks, driven by a scripted client.
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod/v4';
import { createToolRegistry, defineTool } from '../core/tools/index.js';
import {
  createErrorHandleStep,
  createGenerationStep,
  createInitialState,
  createStartStep,
  createToolDispatchStep,
  runWorkflow,
  setError,
  WorkflowDefinitionError,
  WorkflowEngine,
  type ExecutableStepId,
  type WorkflowDefinition,
} from '../core/workflow/index.js';
import { createScriptedClient, toolCall, type ScriptedReply } from './helpers/scripted-client.js';

interface EmptyData {
  note: string;
}

function recordSteps(engine: WorkflowEngine<EmptyData>, into: ExecutableStepId[]): void {
  engine.on('step:start', (step) => {
    into.push(step);
  });
}

function simpleDefinition(replies: ScriptedReply[]): WorkflowDefinition<EmptyData> {
  const client = createScriptedClient(replies);
  return {
    name: 'simple',
    steps: {
      start: createStartStep<EmptyData>({ system: 'You are terse.', user: 'hi' }),
      generate: createGenerationStep<EmptyData>({ client }),
      finalize: async (state) => state,
      error_handle: createErrorHandleStep<EmptyData>({ maxRetries: 3 }),
    },
    transitions: { start: () => 'generate' },
    resumeStep: 'generate',
  };
}

describe('WorkflowEngine', () => {
  it('should run start, generate and finalize in order', async () => {
    // Given
    const steps: ExecutableStepId[] = [];
    const onComplete = vi.fn();

    // When
    const result = await runWorkflow(simpleDefinition(['hello']), createInitialState<EmptyData>({ note: '' }), {
      observe: (engine) => {
        recordSteps(engine, steps);
        engine.on('workflow:complete', onComplete);
      },
    });

    // Then
    expect(steps).toEqual(['start', 'generate', 'finalize']);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.state.status).toBe('completed');
    expect(result.state.currentStep).toBe('terminal');
    expect(result.state.iteration).toBe(1);
    expect(result.state.messages).toEqual([
      { role: 'system', content: 'You are terse.' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
    ]);
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it('should dispatch tool calls and return to generate', async () => {
    // Given: an echo tool and a model that calls it once
    const echo = defineTool({
      name: 'echo',
      description: 'Echo text back',
      schema: z.object({ text: z.string() }),
      execute: ({ text }) => ({ echoed: text }),
    });
    const registry = createToolRegistry([echo]);
    const call = toolCall('echo', { text: 'ping' });
    const client = createScriptedClient([{ toolCalls: [call] }, 'done']);
    const definition: WorkflowDefinition<EmptyData> = {
      name: 'tools',
      steps: {
        start: createStartStep<EmptyData>({ user: 'say ping' }),
        generate: createGenerationStep<EmptyData>({ client, tools: registry }),
        dispatch_tool: createToolDispatchStep<EmptyData>({ registry }),
        finalize: async (state) => state,
      },
      transitions: { start: () => 'generate' },
      resumeStep: 'generate',
    };
    const steps: ExecutableStepId[] = [];

    // When
    const result = await runWorkflow(definition, createInitialState<EmptyData>({ note: '' }), {
      observe: (engine) => recordSteps(engine, steps),
    });

    // Then
    expect(steps).toEqual(['start', 'generate', 'dispatch_tool', 'generate', 'finalize']);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.state.iteration).toBe(2);
    expect(result.state.messages[0]).toEqual({ role: 'user', content: 'say ping' });
    expect(result.state.messages[1]).toEqual({ role: 'assistant', content: '', toolCalls: [call] });
    expect(result.state.messages[2]).toEqual({
      role: 'tool',
      content: '{"echoed":"ping"}',
      toolCallId: call.id,
      name: 'echo',
    });
    expect(client.requests[0]?.tools?.map((tool) => tool.name)).toEqual(['echo']);
  });

  it('should fail the run once the retry ceiling is reached', async () => {
    // Given: every reply is rejected
    const client = createScriptedClient(['a', 'b', 'c', 'd']);
    const definition: WorkflowDefinition<EmptyData> = {
      name: 'always-failing',
      steps: {
        start: createStartStep<EmptyData>({ user: 'go' }),
        generate: createGenerationStep<EmptyData>({
          client,
          onReply: (state) => setError(state, 'bad reply'),
        }),
        finalize: async (state) => state,
        error_handle: createErrorHandleStep<EmptyData>({ maxRetries: 2 }),
      },
      transitions: { start: () => 'generate' },
      resumeStep: 'generate',
    };
    const steps: ExecutableStepId[] = [];
    const onAbort = vi.fn();

    // When
    const result = await runWorkflow(definition, createInitialState<EmptyData>({ note: '' }), {
      observe: (engine) => {
        recordSteps(engine, steps);
        engine.on('workflow:abort', onAbort);
      },
    });

    // Then: two retries, then the third error fails the run
    expect(steps).toEqual([
      'start',
      'generate', 'error_handle',
      'generate', 'error_handle',
      'generate', 'error_handle',
    ]);
    expect(result).toEqual({ success: false, error: 'Max retries (2) exceeded: bad reply', state: null });
    expect(client.requests).toHaveLength(3);
    expect(onAbort).toHaveBeenCalledTimes(1);
  });

  it('should note each handled error in the conversation', async () => {
    // Given: the first reply is rejected, the second accepted
    const client = createScriptedClient(['bad', 'good']);
    const definition: WorkflowDefinition<EmptyData> = {
      name: 'recovering',
      steps: {
        start: createStartStep<EmptyData>({ user: 'go' }),
        generate: createGenerationStep<EmptyData>({
          client,
          onReply: (state, response) => (response.content === 'bad' ? setError(state, 'rejected') : state),
        }),
        finalize: async (state) => state,
        error_handle: createErrorHandleStep<EmptyData>({ maxRetries: 3 }),
      },
      transitions: { start: () => 'generate' },
      resumeStep: 'generate',
    };

    // When
    const result = await runWorkflow(definition, createInitialState<EmptyData>({ note: '' }));

    // Then
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.state.retryCount).toBe(1);
    expect(result.state.lastError).toBeNull();
    expect(result.state.messages.map((turn) => turn.content)).toEqual([
      'go',
      'bad',
      'An error occurred: rejected. Retry count: 0',
      'good',
    ]);
  });

  describe('iteration limit', () => {
    function loopingDefinition(replies: ScriptedReply[]): WorkflowDefinition<EmptyData> {
      return {
        name: 'looping',
        steps: {
          start: createStartStep<EmptyData>({ user: 'go' }),
          generate: createGenerationStep<EmptyData>({ client: createScriptedClient(replies) }),
          aggregate_partial: async (state) => state,
          finalize: async (state) => state,
        },
        transitions: {
          start: () => 'generate',
          generate: () => 'aggregate_partial',
          aggregate_partial: () => 'generate',
        },
        resumeStep: 'generate',
        maxIterations: 2,
      };
    }

    it('should abort when the limit is reached and no handler extends it', async () => {
      const onLimit = vi.fn();

      const result = await runWorkflow(loopingDefinition(['1', '2']), createInitialState<EmptyData>({ note: '' }), {
        observe: (engine) => engine.on('iteration:limit', onLimit),
      });

      expect(result).toEqual({ success: false, error: 'Max iterations reached', state: null });
      expect(onLimit).toHaveBeenCalledWith(2, 2);
    });

    it('should continue for the iterations the handler grants', async () => {
      // Given: one extra iteration, then stop
      const onIterationLimit = vi.fn()
        .mockResolvedValueOnce(1)
        .mockResolvedValueOnce(null);
      const steps: ExecutableStepId[] = [];

      // When
      const result = await runWorkflow(loopingDefinition(['1', '2', '3']), createInitialState<EmptyData>({ note: '' }), {
        onIterationLimit,
        observe: (engine) => recordSteps(engine, steps),
      });

      // Then
      expect(result.success).toBe(false);
      expect(steps.filter((step) => step === 'generate')).toHaveLength(3);
      expect(onIterationLimit).toHaveBeenNthCalledWith(1, { currentIteration: 2, maxIterations: 2, currentStep: 'generate' });
      expect(onIterationLimit).toHaveBeenNthCalledWith(2, { currentIteration: 3, maxIterations: 3, currentStep: 'generate' });
    });

    it('should let the engine option override the definition limit', async () => {
      const result = await runWorkflow(loopingDefinition(['1']), createInitialState<EmptyData>({ note: '' }), {
        maxIterations: 1,
      });

      expect(result).toEqual({ success: false, error: 'Max iterations reached', state: null });
    });
  });

  it('should abort when a step throws', async () => {
    const definition: WorkflowDefinition<EmptyData> = {
      name: 'throwing',
      steps: {
        start: async () => {
          throw new Error('boom');
        },
        finalize: async (state) => state,
      },
      transitions: {},
      resumeStep: 'start',
    };

    const result = await runWorkflow(definition, createInitialState<EmptyData>({ note: '' }));

    expect(result).toEqual({ success: false, error: 'Step execution failed: boom', state: null });
  });

  it('should abort a step that repeats past the loop threshold', async () => {
    const definition: WorkflowDefinition<EmptyData> = {
      name: 'spinning',
      steps: {
        start: async (state) => state,
        iterate_item: async (state) => state,
        finalize: async (state) => state,
      },
      transitions: {
        start: () => 'iterate_item',
        iterate_item: () => 'iterate_item',
      },
      resumeStep: 'iterate_item',
      loopDetection: { maxConsecutiveSameStep: 2, action: 'abort' },
    };

    const result = await runWorkflow(definition, createInitialState<EmptyData>({ note: '' }));

    expect(result).toEqual({
      success: false,
      error: 'Loop detected: step "iterate_item" ran 3 times consecutively',
      state: null,
    });
  });

  describe('definition checks', () => {
    it('should require a finalize step', () => {
      const definition: WorkflowDefinition<EmptyData> = {
        name: 'no-finalize',
        steps: { start: async (state) => state },
        transitions: {},
        resumeStep: 'start',
      };

      expect(() => new WorkflowEngine(definition, createInitialState<EmptyData>({ note: '' })))
        .toThrow(WorkflowDefinitionError);
    });

    it('should reject transitions for steps without an executor', () => {
      const definition: WorkflowDefinition<EmptyData> = {
        name: 'dangling',
        steps: { start: async (state) => state, finalize: async (state) => state },
        transitions: { iterate_item: () => 'finalize' },
        resumeStep: 'start',
      };

      expect(() => new WorkflowEngine(definition, createInitialState<EmptyData>({ note: '' })))
        .toThrow('transition defined for step "iterate_item" which has no executor');
    });

    it('should reject a resume step without an executor', () => {
      const definition: WorkflowDefinition<EmptyData> = {
        name: 'no-resume',
        steps: { start: async (state) => state, finalize: async (state) => state },
        transitions: {},
        resumeStep: 'generate',
      };

      expect(() => new WorkflowEngine(definition, createInitialState<EmptyData>({ note: '' })))
        .toThrow('resume step "generate" has no executor');
    });
  });
});
