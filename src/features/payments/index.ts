export { parseUserInput, normalizeCountry, type ParsedQuery } from './parser.js';
export { lookupPaymentMethods, type PaymentLookupResult, type PaymentLookupSources } from './lookup.js';
export {
  PAYMENT_PARSER_PROMPT,
  parseModelQuery,
  createPaymentWorkflow,
  runPaymentLookup,
  type ParseSource,
  type PaymentWorkflowData,
  type PaymentWorkflowOptions,
  type PaymentLookupRun,
} from './workflow.js';
