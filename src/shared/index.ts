export {
  CodecError,
  invalidParams,
  notFound,
  parseError,
  validationError,
  unsupported,
  isCodecError,
} from './errors.js';
export type { ErrorCode } from './errors.js';
