/**
 * Payment-method lookup, one-shot or interactive
 */

import type { GlobalConfig } from '../core/models/index.js';
import type { RunWorkflowOptions } from '../core/workflow/index.js';
import {
  runPaymentLookup,
  type PaymentLookupRun,
  type PaymentLookupSources,
  type PaymentWorkflowData,
  type PaymentWorkflowOptions,
} from '../features/payments/index.js';
import { loadGlobalConfig } from '../infra/config/global/index.js';
import { DEFAULT_PAYMENT_METHODS_CSV, getCountryIndex, PaymentMethodTable } from '../infra/data/index.js';
import { runInteractiveLoop } from '../shared/prompt/index.js';
import { debug, header, info, json, list, status, warn } from '../shared/ui/index.js';
import { createRuntime, workflowRunOptions, type GlobalCommandOptions } from './runtime.js';

export interface PaymentsCommandOptions extends GlobalCommandOptions {
  /** Parse locally instead of asking the model */
  heuristic?: boolean;
  json?: boolean;
}

function loadSources(config: GlobalConfig): PaymentLookupSources {
  return {
    table: PaymentMethodTable.fromCsv(config.data.paymentMethodsCsv ?? DEFAULT_PAYMENT_METHODS_CSV),
    countries: getCountryIndex(),
  };
}

function printLookup(run: PaymentLookupRun, asJson: boolean): void {
  if (asJson) {
    json(run.result);
    return;
  }
  const { result } = run;
  debug(`Parsed by ${run.parseSource ?? 'nothing'}: ${JSON.stringify(run.parsedQuery)}`);
  if (result.count === 0) {
    warn(result.note);
    return;
  }
  status('Country', result.country ?? '');
  status('Type', result.payment_type ?? 'any');
  info(`${result.count} payment method(s):`);
  list(result.types);
}

export async function paymentsCommand(query: string | undefined, options: PaymentsCommandOptions): Promise<void> {
  let workflowOptions: PaymentWorkflowOptions;
  let runOptions: RunWorkflowOptions<PaymentWorkflowData> = {};

  if (options.heuristic) {
    workflowOptions = { sources: loadSources(loadGlobalConfig()) };
  } else {
    const runtime = createRuntime(options);
    workflowOptions = {
      sources: loadSources(runtime.config),
      client: runtime.client,
      model: runtime.model,
    };
    runOptions = workflowRunOptions<PaymentWorkflowData>(runtime);
  }

  const ask = async (input: string): Promise<void> => {
    printLookup(await runPaymentLookup(input, workflowOptions, runOptions), options.json === true);
  };

  if (query) {
    await ask(query);
    return;
  }

  header('Payment method lookup');
  info('Try "US card" or "bank transfer in Germany"');
  await runInteractiveLoop({ prompt: 'Query> ', onInput: ask });
}
