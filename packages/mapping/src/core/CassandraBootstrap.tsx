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
import type {ILogger} from '@cqlmap/logger/src/ILogger';
import {createLogger} from '@cqlmap/logger/src/Logger';
import {createCassandraClient, type ICassandraSession} from '@cqlmap/mapping/src/core/CassandraSession';
import {CassandraTemplate} from '@cqlmap/mapping/src/core/CassandraTemplate';
import type {AnyConverter} from '@cqlmap/mapping/src/conversion/Converter';
import {CustomConversions} from '@cqlmap/mapping/src/conversion/CustomConversions';
import {MappingCassandraConverter} from '@cqlmap/mapping/src/mapping/MappingCassandraConverter';

export interface CreateTemplateOptions {
	converters?: ReadonlyArray<AnyConverter>;
	/** Defaults to a driver client built from `config.cassandra`. */
	session?: ICassandraSession;
	logger?: ILogger;
}

export function createTemplateFromConfig(config: CqlMapConfig, options: CreateTemplateOptions = {}): CassandraTemplate {
	const logger =
		options.logger ?? createLogger({name: 'cqlmap', level: config.logging.level, bindings: {env: config.env}});

	const conversions = new CustomConversions(options.converters ?? [], {
		logger: logger.child({component: 'custom-conversions'}),
	});

	return new CassandraTemplate(options.session ?? createCassandraClient(config.cassandra), {
		converter: new MappingCassandraConverter(conversions),
		logger: logger.child({component: 'cassandra-template'}),
		logQueries: config.mapping.log_queries,
	});
}
