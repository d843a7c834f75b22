/*
 * Copyright (C) 2026 Fluxer Contributors
 *
 * This file is part of Fluxer.
 *
 * Fluxer is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * Fluxer is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with Fluxer. If not, see <https://www.gnu.org/licenses/>.
 */

export type QueryType = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE' | 'BATCH' | 'QUERY';

export function getQueryType(cql: string): QueryType {
	const trimmed = cql.trim().toUpperCase();
	if (trimmed.startsWith('SELECT')) return 'SELECT';
	if (trimmed.startsWith('INSERT')) return 'INSERT';
	if (trimmed.startsWith('UPDATE')) return 'UPDATE';
	if (trimmed.startsWith('DELETE')) return 'DELETE';
	if (trimmed.startsWith('BEGIN BATCH')) return 'BATCH';
	return 'QUERY';
}

const TABLE_PATTERNS: Partial<Record<QueryType, RegExp>> = {
	SELECT: /FROM\s+([\w.]+)/i,
	INSERT: /INTO\s+([\w.]+)/i,
	UPDATE: /UPDATE\s+([\w.]+)/i,
	DELETE: /FROM\s+([\w.]+)/i,
};

export function extractTableName(cql: string): string {
	const queryType = getQueryType(cql);
	if (queryType === 'BATCH') return 'batch';

	const pattern = TABLE_PATTERNS[queryType];
	if (!pattern) return 'unknown';

	const match = cql.match(pattern);
	return match?.[1] ?? 'unknown';
}

export function formatCql(cql: string): string {
	return cql
		.replace(/\s+/g, ' ')
		.replace(/\s*;\s*$/, '')
		.trim();
}

export interface ParamSummary {
	type: string;
	len?: number;
	size?: number;
}

/** Describes bound values by shape only, so failures can be logged without their contents. */
export function summarizeParams(params: Record<string, unknown>): Record<string, ParamSummary> {
	const summary: Record<string, ParamSummary> = {};
	for (const [key, value] of Object.entries(params)) {
		if (typeof value === 'string') summary[key] = {type: 'string', len: value.length};
		else if (Buffer.isBuffer(value)) summary[key] = {type: 'buffer', len: value.length};
		else if (value instanceof Set) summary[key] = {type: 'set', size: value.size};
		else if (value instanceof Map) summary[key] = {type: 'map', size: value.size};
		else if (value instanceof Date) summary[key] = {type: 'date'};
		else if (Array.isArray(value)) summary[key] = {type: 'array', len: value.length};
		else if (value === null) summary[key] = {type: 'null'};
		else summary[key] = {type: typeof value};
	}
	return summary;
}
