/**
 * Chat agent tools
 *
 * Weather and search are served from fixed lab data.
 */

import { z } from 'zod/v4';
import { createToolRegistry, defineTool, type ToolOutput, type ToolRegistry } from '../../core/tools/index.js';

export const CHAT_TOOL_NAMES = ['get_weather', 'calculator', 'web_search', 'get_current_time'] as const;

export type ChatToolName = (typeof CHAT_TOOL_NAMES)[number];

interface WeatherReading {
  temperature: number;
  condition: string;
  humidity: number;
}

const WEATHER: Readonly<Record<string, WeatherReading>> = {
  'new york': { temperature: 22, condition: 'sunny', humidity: 65 },
  london: { temperature: 15, condition: 'cloudy', humidity: 80 },
  tokyo: { temperature: 28, condition: 'rainy', humidity: 75 },
  paris: { temperature: 18, condition: 'partly cloudy', humidity: 70 },
};

const UNKNOWN_WEATHER: WeatherReading = { temperature: 20, condition: 'unknown', humidity: 50 };

interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

const SEARCH_RESULTS: Readonly<Record<string, readonly SearchHit[]>> = {
  typescript: [
    { title: 'TypeScript', url: 'https://www.typescriptlang.org', snippet: 'TypeScript is JavaScript with syntax for types...' },
    { title: 'TypeScript Handbook', url: 'https://www.typescriptlang.org/docs/handbook', snippet: 'The TypeScript Handbook is a comprehensive guide...' },
  ],
  ai: [
    { title: 'Artificial Intelligence', url: 'https://en.wikipedia.org/wiki/Artificial_intelligence', snippet: 'AI is intelligence demonstrated by machines...' },
    { title: 'Machine Learning', url: 'https://en.wikipedia.org/wiki/Machine_learning', snippet: 'Machine learning is a subset of AI...' },
  ],
  weather: [
    { title: 'Weather Forecast', url: 'https://weather.com', snippet: 'Get current weather conditions and forecasts...' },
  ],
};

const MAX_SEARCH_RESULTS = 3;

export function getWeather(location: string): ToolOutput {
  const reading = WEATHER[location.trim().toLowerCase()] ?? UNKNOWN_WEATHER;
  return { location, ...reading };
}

export const CALCULATOR_OPERATIONS = ['add', 'subtract', 'multiply', 'divide', 'power', 'sqrt', 'sin', 'cos', 'tan'] as const;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

const BINARY_OPERATIONS = new Map<string, (a: number, b: number) => number>([
  ['add', (a, b) => a + b],
  ['subtract', (a, b) => a - b],
  ['multiply', (a, b) => a * b],
  ['divide', (a, b) => a / b],
  ['power', (a, b) => a ** b],
]);

const UNARY_OPERATIONS = new Map<string, (a: number) => number>([
  ['sqrt', (a) => Math.sqrt(a)],
  ['sin', (a) => Math.sin(toRadians(a))],
  ['cos', (a) => Math.cos(toRadians(a))],
  ['tan', (a) => Math.tan(toRadians(a))],
]);

/** Trigonometric operations take degrees */
export function calculate(operation: string, a: number, b?: number): ToolOutput {
  const binary = BINARY_OPERATIONS.get(operation);
  if (binary) {
    if (b === undefined) {
      return { error: `Operation ${operation} requires a second operand` };
    }
    if (operation === 'divide' && b === 0) {
      return { error: 'Division by zero is not allowed' };
    }
    return { operation, operands: [a, b], result: binary(a, b) };
  }

  const unary = UNARY_OPERATIONS.get(operation);
  if (unary) {
    if (operation === 'sqrt' && a < 0) {
      return { error: 'Square root of a negative number is not allowed' };
    }
    return { operation, operands: b === undefined ? [a] : [a, b], result: unary(a) };
  }

  return { error: `Unknown operation: ${operation}` };
}

export function webSearch(query: string): ToolOutput {
  const hits = SEARCH_RESULTS[query.trim().toLowerCase()] ?? [
    { title: `Search results for ${query}`, url: 'https://example.com', snippet: `Information about ${query}...` },
  ];
  return { query, results: hits.slice(0, MAX_SEARCH_RESULTS) };
}

/** YYYY-MM-DD HH:MM:SS in UTC */
export function formatUtcDateTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function getCurrentTime(now: Date): ToolOutput {
  return {
    current_time: formatUtcDateTime(now),
    timezone: 'UTC',
    timestamp: now.getTime() / 1000,
  };
}

export interface ChatToolOptions {
  now?: () => Date;
}

export function createChatTools(options: ChatToolOptions = {}): ToolRegistry<ChatToolName> {
  const now = options.now ?? (() => new Date());

  return createToolRegistry<ChatToolName>([
    defineTool({
      name: 'get_weather',
      description: 'Get current weather information for a specific location',
      schema: z.object({
        location: z.string().min(1).describe('The city or location to get weather for'),
      }),
      execute: ({ location }) => getWeather(location),
    }),
    defineTool({
      name: 'calculator',
      description: 'Perform mathematical calculations including basic operations and trigonometric functions (degrees)',
      schema: z.object({
        operation: z.enum(CALCULATOR_OPERATIONS).describe('The mathematical operation to perform'),
        a: z.number().describe('First number for the operation'),
        b: z.number().optional().describe('Second number for the operation (not needed for sqrt, sin, cos, tan)'),
      }),
      execute: ({ operation, a, b }) => calculate(operation, a, b),
    }),
    defineTool({
      name: 'web_search',
      description: 'Search the web for information on a given topic',
      schema: z.object({
        query: z.string().min(1).describe('The search query'),
      }),
      execute: ({ query }) => webSearch(query),
    }),
    defineTool({
      name: 'get_current_time',
      description: 'Get the current date and time',
      schema: z.object({}),
      execute: () => getCurrentTime(now()),
    }),
  ]);
}
