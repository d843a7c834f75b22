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

import type {CqlMapConfig} from '@cqlmap/config/src/ConfigSchema';
import {createTemplateFromConfig} from '@cqlmap/mapping/src/core/CassandraBootstrap';
import {buildClientOptions, createCassandraClient} from '@cqlmap/mapping/src/core/CassandraSession';
import {writingConverter} from '@cqlmap/mapping/src/conversion/Converter';
import {MockCassandraSession} from '@cqlmap/mapping/src/test/mocks/MockCassandraSession';
import {MockLogger} from '@cqlmap/mapping/src/test/mocks/MockLogger';
import cassandra from 'cassandra-driver';
import {describe, expect, test} from 'vitest';

function makeConfig(overrides: Partial<CqlMapConfig> = {}): CqlMapConfig {
	return {
		env: 'test',
		cassandra: {hosts: ['10.0.0.1', '10.0.0.2'], keyspace: 'sensors', local_dc: 'dc1'},
		logging: {level: 'info'},
		mapping: {log_queries: true},
		...overrides,
	};
}

class Temperature {
	constructor(readonly celsius: number) {}
}

describe('buildClientOptions', () => {
	test('maps the connection settings and driver encoding', () => {
		const options = buildClientOptions(makeConfig().cassandra);

		expect(options.contactPoints).toEqual(['10.0.0.1', '10.0.0.2']);
		expect(options.keyspace).toBe('sensors');
		expect(options.localDataCenter).toBe('dc1');
		expect(options.encoding).toEqual({
			map: Map,
			set: Set,
			useUndefinedAsUnset: false,
			useBigIntAsLong: true,
			useBigIntAsVarint: true,
		});
		expect(options.credentials).toBeUndefined();
	});

	test('adds credentials only when both are configured', () => {
		const base = makeConfig().cassandra;
		expect(buildClientOptions({...base, username: 'cqlmap'}).credentials).toBeUndefined();
		expect(buildClientOptions({...base, username: 'cqlmap', password: 'test-secret'}).credentials).toEqual({
			username: 'cqlmap',
			password: 'test-secret',
		});
	});

	test('creates a driver client without connecting', () => {
		expect(createCassandraClient(makeConfig().cassandra)).toBeInstanceOf(cassandra.Client);
	});
});

describe('createTemplateFromConfig', () => {
	test('wires converters, logger and query logging from the config', async () => {
		const session = new MockCassandraSession();
		const logger = new MockLogger();
		const template = createTemplateFromConfig(makeConfig(), {
			session,
			logger,
			converters: [
				writingConverter({sourceType: Temperature, targetType: Number, convert: (temperature) => temperature.celsius}),
			],
		});

		expect(template.getConverter().writeValue(new Temperature(3))).toBe(3);

		await template.executeQuery('SELECT name FROM sensors WHERE name = :name', {name: 'kitchen'});
		const [entry] = logger.atLevel('debug');
		expect(entry.bindings.component).toBe('cassandra-template');
		expect(entry.msg).toBe('Cassandra query executed');
	});

	test('query logging follows the mapping config', async () => {
		const logger = new MockLogger();
		const template = createTemplateFromConfig(makeConfig({mapping: {log_queries: false}}), {
			session: new MockCassandraSession(),
			logger,
		});

		await template.executeQuery('SELECT name FROM sensors WHERE name = :name', {name: 'kitchen'});
		expect(logger.atLevel('debug')).toHaveLength(0);
	});
});
