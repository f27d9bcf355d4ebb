/**
 * Response interpreter exports
 */

export {
  interpretResponse,
  interpretDownload,
  isSuccessStatus,
  success,
  failure,
} from './interpreter';
export type { Outcome, Success, Failure, TransportOutcome } from './interpreter';
