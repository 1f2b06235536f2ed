export {
  parseResponse,
  parseSources,
  defaultFormatter,
  type ParsedResponse,
  type ResponseFormatter,
  type Source
} from './sources.js';
