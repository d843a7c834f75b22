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
import {CassandraTemplate} from '@cqlmap/mapping/src/core/CassandraTemplate';
import {CustomConversions} from '@cqlmap/mapping/src/conversion/CustomConversions';
import {defineEntity} from '@cqlmap/mapping/src/mapping/EntitySchema';
import {MappingCassandraConverter} from '@cqlmap/mapping/src/mapping/MappingCassandraConverter';
import {MockCassandraSession} from '@cqlmap/mapping/src/test/mocks/MockCassandraSession';
import {MockLogger} from '@cqlmap/mapping/src/test/mocks/MockLogger';
import {DateTime} from 'luxon';
import {describe, expect, test} from 'vitest';

class Sensor {
	name = '';
	installedAt: DateTime | null = null;
}

const SensorSchema = defineEntity({
	type: Sensor,
	table: 'sensors',
	columns: {
		name: String,
		installedAt: {column: 'installed_at', type: DateTime},
	},
});

class Marker {}

const MarkerSchema = defineEntity({type: Marker, table: 'markers', columns: {}});

const SELECT_SENSOR = 'SELECT name, installed_at FROM sensors WHERE name = :name';

function createTemplate(session: MockCassandraSession, logQueries = false): {
	template: CassandraTemplate;
	logger: MockLogger;
} {
	const logger = new MockLogger();
	const converter = new MappingCassandraConverter(new CustomConversions([], {logger}));
	return {template: new CassandraTemplate(session, {converter, logger, logQueries}), logger};
}

describe('CassandraTemplate', () => {
	test('select executes a prepared statement and maps every row', async () => {
		const session = new MockCassandraSession({
			rows: [
				{name: 'kitchen', installed_at: new Date(Date.UTC(2023, 0, 1))},
				{name: 'garage', installed_at: null},
			],
		});
		const {template} = createTemplate(session);

		const sensors = await template.select(SELECT_SENSOR, SensorSchema, {name: 'kitchen'});

		expect(session.executeSpy).toHaveBeenCalledWith(SELECT_SENSOR, {name: 'kitchen'}, {prepare: true});
		expect(sensors).toHaveLength(2);
		expect(sensors[0]).toBeInstanceOf(Sensor);
		expect(sensors[0].name).toBe('kitchen');
		expect(sensors[0].installedAt?.toISO()).toBe('2023-01-01T00:00:00.000Z');
		expect(sensors[1].installedAt).toBeNull();
	});

	test('selectOne returns null without rows', async () => {
		const {template} = createTemplate(new MockCassandraSession());
		await expect(template.selectOne(SELECT_SENSOR, SensorSchema, {name: 'attic'})).resolves.toBeNull();
	});

	test('selectOne maps the first row', async () => {
		const session = new MockCassandraSession({rows: [{name: 'kitchen', installed_at: null}]});
		const {template} = createTemplate(session);

		const sensor = await template.selectOne(SELECT_SENSOR, SensorSchema, {name: 'kitchen'});
		expect(sensor?.name).toBe('kitchen');
	});

	test('selectOne rejects a query that returns more than one row', async () => {
		const session = new MockCassandraSession({
			rows: [
				{name: 'kitchen', installed_at: null},
				{name: 'garage', installed_at: null},
			],
		});
		const {template} = createTemplate(session);

		const selected = template.selectOne(SELECT_SENSOR, SensorSchema, {name: 'kitchen'});
		await expect(selected).rejects.toThrow(DuplicateResultError);
		await expect(selected).rejects.toThrow(`Found two or more results in query ${SELECT_SENSOR}`);
	});

	test('write refuses collections in place of an entity', async () => {
		const session = new MockCassandraSession();
		const {template} = createTemplate(session);
		const cql = 'INSERT INTO markers (id) VALUES (:id)';

		await expect(template.write(cql, MarkerSchema, [new Marker()])).rejects.toThrow(
			'Cannot write a collection; write each entity separately',
		);
		await expect(template.write(cql, MarkerSchema, new Set([new Marker()]))).rejects.toThrow(InvalidArgumentError);
		await expect(template.write(cql, MarkerSchema, new Map([['a', new Marker()]]))).rejects.toThrow(
			InvalidArgumentError,
		);
		expect(session.executeSpy).not.toHaveBeenCalled();
	});

	test('write binds the converted entity', async () => {
		const session = new MockCassandraSession();
		const {template} = createTemplate(session);
		const sensor = new Sensor();
		sensor.name = 'porch';
		sensor.installedAt = DateTime.fromISO('2024-06-01T08:30:00.000Z', {zone: 'utc'});

		const cql = 'INSERT INTO sensors (name, installed_at) VALUES (:name, :installed_at)';
		await template.write(cql, SensorSchema, sensor);

		expect(session.executeSpy).toHaveBeenCalledWith(
			cql,
			{name: 'porch', installed_at: new Date(Date.UTC(2024, 5, 1, 8, 30))},
			{prepare: true},
		);
	});

	test('rejects SELECT * statements before executing', async () => {
		const session = new MockCassandraSession();
		const {template} = createTemplate(session);

		await expect(template.executeQuery('SELECT * FROM sensors')).rejects.toThrow(
			'Cannot prepare a statement that looks like `SELECT *`',
		);
		expect(session.executeSpy).not.toHaveBeenCalled();
	});

	test('rejects undefined values anywhere in the params', async () => {
		const session = new MockCassandraSession();
		const {template} = createTemplate(session);

		await expect(template.executeQuery(SELECT_SENSOR, {name: undefined})).rejects.toThrow(InvalidArgumentError);
		await expect(
			template.executeQuery('SELECT name FROM sensors WHERE name IN :names', {names: ['a', undefined]}),
		).rejects.toThrow('Undefined value at ":names[1]"; bind null explicitly');
		await expect(
			template.executeQuery('UPDATE sensors SET meta = :meta WHERE name = :name', {
				name: 'a',
				meta: new Map([['k', undefined]]),
			}),
		).rejects.toThrow('Undefined value at ":meta{mapVal:0}"; bind null explicitly');
		expect(session.executeSpy).not.toHaveBeenCalled();
	});

	test('logs and rethrows failed queries', async () => {
		const session = new MockCassandraSession({shouldFail: true});
		const {template, logger} = createTemplate(session);

		await expect(template.executeQuery(SELECT_SENSOR, {name: 'kitchen'})).rejects.toThrow(
			'Mock Cassandra execute failure',
		);
		expect(logger.atLevel('warn')).toEqual([
			{
				level: 'warn',
				bindings: {
					error: 'Mock Cassandra execute failure',
					queryType: 'SELECT',
					table: 'sensors',
					query: SELECT_SENSOR,
					params: {name: {type: 'string', len: 7}},
				},
				msg: 'Cassandra query failed',
			},
		]);
	});

	test('debug-logs statements only when query logging is on', async () => {
		const quiet = createTemplate(new MockCassandraSession());
		await quiet.template.executeQuery(SELECT_SENSOR, {name: 'kitchen'});
		expect(quiet.logger.atLevel('debug')).toHaveLength(0);

		const verbose = createTemplate(new MockCassandraSession({rows: [{name: 'kitchen', installed_at: null}]}), true);
		await verbose.template.executeQuery(SELECT_SENSOR, {name: 'kitchen'});
		expect(verbose.logger.atLevel('debug')).toEqual([
			{
				level: 'debug',
				bindings: {
					queryType: 'SELECT',
					table: 'sensors',
					query: SELECT_SENSOR,
					durationMs: expect.any(Number),
					rowCount: 1,
				},
				msg: 'Cassandra query executed',
			},
		]);
	});

	test('exposes the table name and converter', () => {
		const {template} = createTemplate(new MockCassandraSession());
		expect(template.getTableName(SensorSchema)).toBe('sensors');
		expect(template.getConverter()).toBeInstanceOf(MappingCassandraConverter);
	});
});
