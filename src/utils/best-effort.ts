// src/utils/best-effort.ts

import { OBSERVABILITY_CONSTANTS } from '../config/constants';
import type { ObservabilityLoggerService } from '../logger/observability-logger.service';

/**
 * Run one observability-backend call; a failure is logged as a warning and
 * swallowed. Never wrap application code in this.
 */
export function bestEffort(logger: ObservabilityLoggerService, detail: string, call: () => void): void {
    try {
        call();
    } catch (err) {
        logger.warn(OBSERVABILITY_CONSTANTS.LANGFUSE_LOG_METHOD, detail, err);
    }
}

export async function bestEffortAsync(
    logger: ObservabilityLoggerService,
    detail: string,
    call: () => Promise<void>
): Promise<void> {
    try {
        await call();
    } catch (err) {
        logger.warn(OBSERVABILITY_CONSTANTS.LANGFUSE_LOG_METHOD, detail, err);
    }
}
