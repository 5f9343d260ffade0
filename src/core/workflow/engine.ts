/**
 * Workflow execution engine
 */

import { EventEmitter } from 'node:events';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import { DEFAULT_MAX_ITERATIONS, ERROR_MESSAGES, GENERATION_STEP } from './constants.js';
import { LoopDetector } from './loop-detector.js';
import { moveTo, withStatus } from './state.js';
import { routeNext } from './transitions.js';
import type {
  ExecutableStepId,
  StepExecutor,
  WorkflowDefinition,
  WorkflowEngineOptions,
  WorkflowEvents,
  WorkflowRunResult,
  WorkflowState,
} from './types.js';

const log = createLogger('engine');

export class WorkflowDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkflowDefinitionError';
  }
}

/** Typed view of the engine's events */
export interface WorkflowEngine<D> {
  on<K extends keyof WorkflowEvents<D>>(event: K, listener: WorkflowEvents<D>[K]): this;
  once<K extends keyof WorkflowEvents<D>>(event: K, listener: WorkflowEvents<D>[K]): this;
  emit<K extends keyof WorkflowEvents<D>>(event: K, ...args: Parameters<WorkflowEvents<D>[K]>): boolean;
}

/**
 * Drives a workflow definition from `start` to `terminal`.
 * The engine is the only sequencing authority: steps never call each other.
 */
export class WorkflowEngine<D> extends EventEmitter {
  private state: WorkflowState<D>;
  private readonly definition: WorkflowDefinition<D>;
  private readonly options: WorkflowEngineOptions;
  private readonly loopDetector: LoopDetector;
  private maxIterations: number;

  constructor(definition: WorkflowDefinition<D>, initialState: WorkflowState<D>, options: WorkflowEngineOptions = {}) {
    super();
    this.definition = definition;
    this.options = options;
    this.state = initialState;
    this.maxIterations = options.maxIterations ?? definition.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.loopDetector = new LoopDetector(definition.loopDetection);
    this.validateDefinition();
    log.debug('WorkflowEngine initialized', {
      workflow: definition.name,
      steps: Object.keys(definition.steps),
      resumeStep: definition.resumeStep,
      maxIterations: this.maxIterations,
    });
  }

  /** Validate the definition at construction time */
  private validateDefinition(): void {
    const { steps, transitions, resumeStep, name } = this.definition;
    const initialStep = this.state.currentStep;

    if (initialStep === 'terminal' || !steps[initialStep]) {
      throw new WorkflowDefinitionError(`Workflow "${name}": initial step "${initialStep}" has no executor`);
    }
    if (!steps[resumeStep]) {
      throw new WorkflowDefinitionError(`Workflow "${name}": resume step "${resumeStep}" has no executor`);
    }
    if (!steps.finalize) {
      throw new WorkflowDefinitionError(`Workflow "${name}": a finalize step is required`);
    }
    for (const step of Object.keys(transitions)) {
      if (!this.hasExecutor(step)) {
        throw new WorkflowDefinitionError(`Workflow "${name}": transition defined for step "${step}" which has no executor`);
      }
    }
  }

  private hasExecutor(step: string): boolean {
    return Object.entries(this.definition.steps).some(([id, executor]) => id === step && executor !== undefined);
  }

  getState(): WorkflowState<D> {
    return this.state;
  }

  private getExecutor(step: ExecutableStepId): StepExecutor<D> {
    const executor = this.definition.steps[step];
    if (!executor) {
      throw new WorkflowDefinitionError(ERROR_MESSAGES.UNKNOWN_STEP(step));
    }
    return executor;
  }

  private abort(reason: string): WorkflowRunResult<D> {
    this.state = withStatus(this.state, 'failed');
    log.error('Workflow aborted', { workflow: this.definition.name, reason });
    this.emit('workflow:abort', this.state, reason);
    return { success: false, error: reason, state: null };
  }

  /** Returns true to continue, false when the run must stop */
  private async handleIterationLimit(): Promise<boolean> {
    this.emit('iteration:limit', this.state.iteration, this.maxIterations);

    if (this.options.onIterationLimit) {
      const additional = await this.options.onIterationLimit({
        currentIteration: this.state.iteration,
        maxIterations: this.maxIterations,
        currentStep: this.state.currentStep,
      });
      if (additional !== null && additional > 0) {
        this.maxIterations += additional;
        return true;
      }
    }
    return false;
  }

  /** Run the workflow to completion */
  async run(): Promise<WorkflowRunResult<D>> {
    while (true) {
      const stepId = this.state.currentStep;

      if (stepId === 'terminal') {
        this.state = withStatus(this.state, 'completed');
        this.emit('workflow:complete', this.state);
        return { success: true, state: this.state };
      }

      if (stepId === GENERATION_STEP && this.state.iteration >= this.maxIterations) {
        if (await this.handleIterationLimit()) {
          continue;
        }
        return this.abort(ERROR_MESSAGES.MAX_ITERATIONS_REACHED);
      }

      const loopCheck = this.loopDetector.check(stepId);
      if (loopCheck.shouldWarn) {
        this.emit('step:loop_detected', stepId, loopCheck.count);
      }
      if (loopCheck.shouldAbort) {
        return this.abort(ERROR_MESSAGES.LOOP_DETECTED(stepId, loopCheck.count));
      }

      this.emit('step:start', stepId, this.state.iteration);
      const before = this.state;

      try {
        this.state = await this.getExecutor(stepId)(before);
      } catch (error) {
        return this.abort(ERROR_MESSAGES.STEP_EXECUTION_FAILED(getErrorMessage(error)));
      }

      this.emit('step:complete', stepId, this.state, this.state.messages.slice(before.messages.length));

      if (this.state.status === 'failed') {
        return this.abort(this.state.lastError ?? ERROR_MESSAGES.STEP_EXECUTION_FAILED(stepId));
      }

      const nextStep = routeNext(this.state, this.definition.transitions, this.definition.resumeStep);
      log.debug('Step transition', {
        from: stepId,
        to: nextStep,
        iteration: this.state.iteration,
        lastError: this.state.lastError,
      });
      this.state = moveTo(this.state, nextStep);
    }
  }
}
