/**
 * Shared constants and generators for property-based testing.
 *
 * This module provides:
 * - DEFAULT_NUM_RUNS: default number of test runs per property (100)
 * - getNumRuns(): reads FC_NUM_RUNS env variable or returns default
 * - segmentArbitrary(): directory and file names that pass validation
 * - recordArbitrary(): flat records every binary codec round-trips
 */

import * as fc from "fast-check";

/**
 * Default number of runs per property test.
 */
export const DEFAULT_NUM_RUNS = 100;

/**
 * Get the number of runs for property tests.
 * Reads from FC_NUM_RUNS environment variable if set, otherwise returns DEFAULT_NUM_RUNS.
 *
 * @example
 * // In shell: FC_NUM_RUNS=1000 npm test
 * // In test: fc.assert(fc.property(...), { numRuns: getNumRuns() })
 */
export const getNumRuns = (): number => {
	const envValue = process.env.FC_NUM_RUNS;
	if (envValue === undefined || envValue === "") {
		return DEFAULT_NUM_RUNS;
	}
	const parsed = Number.parseInt(envValue, 10);
	if (Number.isNaN(parsed) || parsed <= 0) {
		return DEFAULT_NUM_RUNS;
	}
	return parsed;
};

/**
 * A single valid path segment: starts with a letter or digit, no separators
 * and no forbidden symbols.
 */
export const segmentArbitrary = (): fc.Arbitrary<string> =>
	fc.stringMatching(/^[a-z0-9][a-z0-9_.-]{0,15}$/);

/**
 * Between zero and `maxDepth` segments joined with `/`.
 */
export const subDirectoryArbitrary = (
	maxDepth = 5,
): fc.Arbitrary<ReadonlyArray<string>> =>
	fc.array(segmentArbitrary(), { maxLength: maxDepth });

/**
 * Records with lower-case keys and scalar or integer-array values.
 */
export const recordArbitrary = (): fc.Arbitrary<Record<string, unknown>> =>
	fc.dictionary(
		fc.stringMatching(/^[a-z]{1,8}$/),
		fc.oneof(
			fc.integer(),
			fc.boolean(),
			fc.string(),
			fc.array(fc.integer(), { maxLength: 5 }),
		),
	);
