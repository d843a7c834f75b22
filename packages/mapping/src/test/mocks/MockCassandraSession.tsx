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

import type {CassandraResult, ICassandraSession} from '@cqlmap/mapping/src/core/CassandraSession';
import type {CassandraRow, CassandraValues} from '@cqlmap/mapping/src/mapping/MappingCassandraConverter';
import type cassandra from 'cassandra-driver';
import {vi} from 'vitest';

export interface MockCassandraSessionConfig {
	rows?: Array<CassandraRow>;
	shouldFail?: boolean;
}

export class MockCassandraSession implements ICassandraSession {
	readonly executeSpy = vi.fn();

	private config: MockCassandraSessionConfig;

	constructor(config: MockCassandraSessionConfig = {}) {
		this.config = config;
	}

	configure(config: MockCassandraSessionConfig): void {
		this.config = {...this.config, ...config};
	}

	async execute(query: string, params: CassandraValues, options: cassandra.QueryOptions): Promise<CassandraResult> {
		this.executeSpy(query, params, options);
		if (this.config.shouldFail) {
			throw new Error('Mock Cassandra execute failure');
		}
		return {rows: this.config.rows ?? []};
	}
}
