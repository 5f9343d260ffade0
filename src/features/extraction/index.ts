export { extractStructured, validateStructured, type ExtractionResult, type ExtractionRequest } from './structured.js';
export {
  SongRequestSchema,
  buildSongPrompt,
  parseSongRequest,
  parseMultipleRequests,
  type SongRequest,
  type SongParseResult,
  type IndexedSongParseResult,
} from './song.js';
export {
  CAR_TYPES,
  RentalRequestSchema,
  RENTAL_SYSTEM_PROMPT,
  DEFAULT_RENTAL_TEXT,
  parseRentalRequest,
  type RentalRequest,
} from './rental.js';
