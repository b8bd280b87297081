#!/usr/bin/env node
import { logger } from "./utils/logger";
import { errorMessage, isFatal } from "./utils/errors";
import { formatRunSummary, runWeeklyDiscovery } from "./workers/weeklyDiscovery";

/**
 * CLI entry: one weekly run over every configured user. Per-user failures are
 * reported in the summary and still exit 0.
 */
async function main(): Promise<number> {
    const controller = new AbortController();
    const cancel = (signal: NodeJS.Signals) => {
        logger.warn(`Received ${signal}, cancelling run at the next request`);
        controller.abort();
    };
    process.once("SIGINT", cancel);
    process.once("SIGTERM", cancel);

    try {
        const summary = await runWeeklyDiscovery({ signal: controller.signal });
        console.log(formatRunSummary(summary));
        return 0;
    } catch (error) {
        if (isFatal(error)) {
            logger.error(errorMessage(error));
        } else {
            logger.error("Weekly discovery crashed", { error });
        }
        return 1;
    } finally {
        process.off("SIGINT", cancel);
        process.off("SIGTERM", cancel);
    }
}

void main().then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        logger.error("Weekly discovery crashed", { error });
        process.exitCode = 1;
    }
);
