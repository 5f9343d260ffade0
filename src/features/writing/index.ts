export { writePost, POST_SYSTEM_PROMPT, DEFAULT_POST_PROMPT, type WritePostOptions } from './post.js';
export {
  runHaikuPipeline,
  buildRatingPrompt,
  HaikuRatingSchema,
  HAIKU_RATER_PROMPT,
  type HaikuRating,
  type HaikuResult,
} from './haiku.js';
