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

import type {CassandraConfig} from '@cqlmap/config/src/ConfigSchema';
import type {CassandraRow, CassandraValues} from '@cqlmap/mapping/src/mapping/MappingCassandraConverter';
import cassandra from 'cassandra-driver';

export interface CassandraResult {
	readonly rows?: ReadonlyArray<CassandraRow>;
}

/** The slice of `cassandra.Client` the template executes statements through. */
export interface ICassandraSession {
	execute(query: string, params: CassandraValues, options: cassandra.QueryOptions): Promise<CassandraResult>;
}

export function buildClientOptions(config: CassandraConfig): cassandra.ClientOptions {
	const clientOptions: cassandra.ClientOptions = {
		contactPoints: [...config.hosts],
		keyspace: config.keyspace,
		localDataCenter: config.local_dc,
		encoding: {
			map: Map,
			set: Set,
			useUndefinedAsUnset: false,
			useBigIntAsLong: true,
			useBigIntAsVarint: true,
		},
	};

	if (config.username && config.password) {
		clientOptions.credentials = {
			username: config.username,
			password: config.password,
		};
	}

	return clientOptions;
}

/** Creates a client without connecting; the driver connects on first execute. */
export function createCassandraClient(config: CassandraConfig): cassandra.Client {
	return new cassandra.Client(buildClientOptions(config));
}
