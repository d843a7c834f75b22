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

import {DuplicateResultError} from '@cqlmap/errors/src/domains/core/DuplicateResultError';
import {InvalidArgumentError} from '@cqlmap/errors/src/domains/core/InvalidArgumentError';
import type {ILogger} from '@cqlmap/logger/src/ILogger';
import {createComponentLogger} from '@cqlmap/logger/src/Logger';
import type {ICassandraSession} from '@cqlmap/mapping/src/core/CassandraSession';
import {extractTableName, formatCql, getQueryType, summarizeParams} from '@cqlmap/mapping/src/core/QueryLogging';
import type {EntitySchema} from '@cqlmap/mapping/src/mapping/EntitySchema';
import {
	type CassandraRow,
	type CassandraValues,
	MappingCassandraConverter,
} from '@cqlmap/mapping/src/mapping/MappingCassandraConverter';

export interface CassandraTemplateOptions {
	converter?: MappingCassandraConverter;
	logger?: ILogger;
	/** Debug-log every statement with its type, table and duration. */
	logQueries?: boolean;
}

function isUnsafePreparedStatement(cql: string): boolean {
	const tokens = cql.trim().split(/\s+/);
	return tokens.length >= 2 && tokens[0].toLowerCase() === 'select' && tokens[1] === '*';
}

function assertNoUndefinedDeep(value: unknown, path: string): void {
	if (value === undefined) {
		throw new InvalidArgumentError(path, `Undefined value at "${path}"; bind null explicitly`);
	}

	if (value === null || typeof value !== 'object') return;
	if (value instanceof Date || Buffer.isBuffer(value)) return;

	if (Array.isArray(value)) {
		value.forEach((element: unknown, index) => assertNoUndefinedDeep(element, `${path}[${index}]`));
		return;
	}

	if (value instanceof Set) {
		let index = 0;
		for (const element of value) {
			assertNoUndefinedDeep(element, `${path}{set:${index}}`);
			index++;
		}
		return;
	}

	if (value instanceof Map) {
		let index = 0;
		for (const [key, element] of value) {
			assertNoUndefinedDeep(key, `${path}{mapKey:${index}}`);
			assertNoUndefinedDeep(element, `${path}{mapVal:${index}}`);
			index++;
		}
		return;
	}

	if (Object.getPrototypeOf(value) !== Object.prototype) return;

	for (const [key, element] of Object.entries(value)) {
		assertNoUndefinedDeep(element, `${path}.${key}`);
	}
}

export class CassandraTemplate {
	private readonly converter: MappingCassandraConverter;
	private readonly logger: ILogger;
	private readonly logQueries: boolean;

	constructor(
		private readonly session: ICassandraSession,
		options: CassandraTemplateOptions = {},
	) {
		this.converter = options.converter ?? new MappingCassandraConverter();
		this.logger = options.logger ?? createComponentLogger('cassandra-template');
		this.logQueries = options.logQueries ?? false;
	}

	getConverter(): MappingCassandraConverter {
		return this.converter;
	}

	getTableName<T extends object>(schema: EntitySchema<T>): string {
		return schema.table;
	}

	async executeQuery(cql: string, params: CassandraValues = {}): Promise<ReadonlyArray<CassandraRow>> {
		if (isUnsafePreparedStatement(cql)) {
			throw new InvalidArgumentError('cql', 'Cannot prepare a statement that looks like `SELECT *`');
		}
		for (const [key, value] of Object.entries(params)) {
			assertNoUndefinedDeep(value, `:${key}`);
		}

		const queryType = getQueryType(cql);
		const table = extractTableName(cql);
		const startTime = performance.now();

		try {
			const result = await this.session.execute(cql, params, {prepare: true});
			const rows = result.rows ?? [];

			if (this.logQueries) {
				this.logger.debug(
					{
						queryType,
						table,
						query: formatCql(cql),
						durationMs: Number((performance.now() - startTime).toFixed(2)),
						rowCount: rows.length,
					},
					'Cassandra query executed',
				);
			}

			return rows;
		} catch (error) {
			const errorMessage = error instanceof Error ? error.message : String(error);
			this.logger.warn(
				{error: errorMessage, queryType, table, query: formatCql(cql), params: summarizeParams(params)},
				'Cassandra query failed',
			);
			throw error;
		}
	}

	async select<T extends object>(cql: string, schema: EntitySchema<T>, params: CassandraValues = {}): Promise<Array<T>> {
		const rows = await this.executeQuery(cql, params);
		return rows.map((row) => this.converter.read(schema, row));
	}

	async selectOne<T extends object>(
		cql: string,
		schema: EntitySchema<T>,
		params: CassandraValues = {},
	): Promise<T | null> {
		const rows = await this.executeQuery(cql, params);
		if (rows.length > 1) {
			throw new DuplicateResultError(formatCql(cql));
		}
		const [row] = rows;
		return row ? this.converter.read(schema, row) : null;
	}

	/** Executes caller-written CQL with the entity's columns bound as named parameters. */
	async write<T extends object>(cql: string, schema: EntitySchema<T>, entity: T): Promise<void> {
		if (Array.isArray(entity) || entity instanceof Set || entity instanceof Map) {
			throw new InvalidArgumentError('entity', 'Cannot write a collection; write each entity separately');
		}
		await this.executeQuery(cql, this.converter.write(schema, entity));
	}
}
