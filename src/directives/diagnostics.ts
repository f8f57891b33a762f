import { getLogger } from "@logtape/logtape";
import { LIBRARY_CATEGORY } from "../logging/config.ts";
import type { SkippedDirective } from "./types.ts";

const logger = getLogger([...LIBRARY_CATEGORY, "directives"]);

/**
 * Log each skipped directive at warning level.
 *
 * Goes through LogTape, so nothing is written until the host has configured
 * a sink for the `envlog` category (or the root logger).
 */
export function reportSkippedDirectives(
	skipped: readonly SkippedDirective[],
): void {
	for (const { directive, index, reason } of skipped) {
		logger.warn("Ignoring log directive {directive}: {reason}", {
			directive,
			index,
			reason,
		});
	}
}
