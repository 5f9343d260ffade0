/**
 * Single-shot labs: post, haiku, rental and song.
 */

import {
  DEFAULT_RENTAL_TEXT,
  parseMultipleRequests,
  parseRentalRequest,
  parseSongRequest,
  type SongParseResult,
} from '../features/extraction/index.js';
import { DEFAULT_POST_PROMPT, runHaikuPipeline, writePost } from '../features/writing/index.js';
import { runInteractiveLoop } from '../shared/prompt/index.js';
import { blankLine, error, header, info, json, list, section, status, success, warn, withSpinner } from '../shared/ui/index.js';
import { createRuntime, type GlobalCommandOptions } from './runtime.js';

export async function postCommand(prompt: string | undefined, options: GlobalCommandOptions): Promise<void> {
  const runtime = createRuntime(options);
  const content = await withSpinner('Writing...', () =>
    writePost(runtime.client, { prompt: prompt ?? DEFAULT_POST_PROMPT, model: runtime.model }));
  console.log(content);
}

export async function haikuCommand(options: GlobalCommandOptions): Promise<void> {
  const runtime = createRuntime(options);
  const result = await runHaikuPipeline(runtime.client, runtime.model);

  section('Haiku');
  console.log(result.haiku);
  blankLine();

  if (result.rating === null) {
    warn('Rating reply was not usable');
    list(result.errors);
    return;
  }
  status('Rate', `${result.rating}/10`, result.rating >= 7 ? 'green' : 'yellow');
  status('Reason', result.reason ?? '');
}

export async function rentalCommand(text: string | undefined, options: GlobalCommandOptions): Promise<void> {
  const runtime = createRuntime(options);
  const result = await parseRentalRequest(runtime.client, text ?? DEFAULT_RENTAL_TEXT, runtime.model);

  if (!result.success) {
    error('Rental request did not validate');
    list(result.errors);
    if (result.rawData !== null) json(result.rawData);
    process.exitCode = 1;
    return;
  }
  json(result.data);
}

function printSongResult(result: SongParseResult): void {
  if (result.success && result.songRequest) {
    success('Parsed song request');
    status('Song', result.songRequest.song_name);
    status('Recipient', result.songRequest.recipient_name);
    status('Message', result.songRequest.free_text);
    return;
  }
  error('Song request did not validate');
  list(result.errors);
  if (result.rawData !== null) json(result.rawData);
}

export interface SongCommandOptions extends GlobalCommandOptions {
  interactive?: boolean;
}

export async function songCommand(inputs: string[], options: SongCommandOptions): Promise<void> {
  const runtime = createRuntime(options);

  if (options.interactive || inputs.length === 0) {
    header('Song request parser');
    await runInteractiveLoop({
      prompt: 'Song request> ',
      onInput: async (input) => {
        printSongResult(await parseSongRequest(runtime.client, input, runtime.model));
      },
    });
    return;
  }

  const results = await parseMultipleRequests(
    runtime.client,
    inputs,
    (result) => {
      section(`Request ${result.index}: ${result.input}`);
      printSongResult(result);
    },
    runtime.model,
  );

  const parsed = results.filter((result) => result.success).length;
  blankLine();
  info(`${parsed}/${results.length} requests parsed`);
  if (parsed < results.length) {
    process.exitCode = 1;
  }
}
