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

import {z} from 'zod';

export const CassandraConfigSchema = z
	.object({
		hosts: z
			.union([z.string(), z.array(z.string())])
			.transform((hosts) => (typeof hosts === 'string' ? hosts.split(',') : hosts))
			.transform((hosts) => hosts.map((host) => host.trim()).filter((host) => host.length > 0))
			.refine((hosts) => hosts.length > 0, 'At least one Cassandra host is required')
			.describe('Contact points, as an array or a comma separated list'),
		keyspace: z.string().min(1).describe('Keyspace every statement runs against'),
		local_dc: z.string().min(1).describe('Local data center for the load balancing policy'),
		username: z.string().optional(),
		password: z.string().optional(),
	})
	.describe('Cassandra connection');
export type CassandraConfig = z.infer<typeof CassandraConfigSchema>;

export const LoggingConfigSchema = z.object({
	level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const MappingConfigSchema = z.object({
	log_queries: z.boolean().describe('Debug-log every executed statement'),
});
export type MappingConfig = z.infer<typeof MappingConfigSchema>;

export const CqlMapConfigSchema = z.object({
	env: z.enum(['development', 'production', 'test']),
	cassandra: CassandraConfigSchema,
	logging: LoggingConfigSchema,
	mapping: MappingConfigSchema,
});
export type CqlMapConfig = z.infer<typeof CqlMapConfigSchema>;
