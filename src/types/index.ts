/**
 * @fileoverview Shared application types.
 */

export {
    AppErrorCode,
    CodedError,
    SourceUnavailableError,
    TimeTableParseError,
    DataQualityError,
    FetchError,
    PlaybackError,
    PreemptionTimeoutError,
    ConfigError,
    toAppError,
    summarizeErrorForLog,
} from './app-errors';
export type { AppError } from './app-errors';
