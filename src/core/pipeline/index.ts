export type { RawRequest, ParseContext, ParseResult, ParseStage } from './types.js';

export { createStage1Decode, queryComponent, type Stage1Options } from './stage-1-decode.js';
export { createStage2Authenticate, type Stage2Options } from './stage-2-authenticate.js';
export { createStage3Verify, type Stage3Options } from './stage-3-verify.js';
export {
  createStage4PostParse,
  PROTOCOL_REQUEST_EVENT,
  type Stage4Options,
} from './stage-4-post-parse.js';
export { runParsePipeline, isParseResult } from './run.js';
