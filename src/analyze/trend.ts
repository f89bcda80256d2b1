/**
 * Trend Estimation — closed-form least-squares slope over an evenly spaced
 * series, plus the small set of descriptive statistics the reports use.
 *
 * The series handed in is normally weekly mood averages rather than raw
 * per-entry scores: a single entry swings too far to trend on its own.
 */

import { TrendDirection } from "../types";

export const DEFAULT_TREND_THRESHOLD = 0.1;

export function mean(values: readonly number[]): number {
	if (values.length === 0) return 0;
	return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample (n − 1) standard deviation; 0 for fewer than two values. */
export function sampleStdDev(values: readonly number[]): number {
	if (values.length < 2) return 0;
	const avg = mean(values);
	const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
	return Math.sqrt(squared / (values.length - 1));
}

/**
 * Ordinary least-squares slope of `values` against x = 0..n−1.
 * Returns 0 for fewer than two points.
 */
export function linearSlope(values: readonly number[]): number {
	const n = values.length;
	if (n < 2) return 0;

	let sumX = 0;
	let sumY = 0;
	let sumXY = 0;
	let sumX2 = 0;
	for (let i = 0; i < n; i++) {
		sumX += i;
		sumY += values[i];
		sumXY += i * values[i];
		sumX2 += i * i;
	}

	// n ≥ 2 with distinct x values, so the denominator is positive
	return (n * sumXY - sumX * sumY) / (n * sumX2 - sumX * sumX);
}

export function classifyTrend(values: readonly number[], threshold = DEFAULT_TREND_THRESHOLD): TrendDirection {
	if (values.length < 2) return "insufficient_data";
	const slope = linearSlope(values);
	if (slope > threshold) return "improving";
	if (slope < -threshold) return "declining";
	return "stable";
}
