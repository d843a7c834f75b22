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

import {access, readFile} from 'node:fs/promises';
import {type ConfigObject, deepMerge, isConfigObject} from '@cqlmap/config/src/config_loader/ConfigObjectMerge';
import {type CqlMapConfig, CqlMapConfigSchema} from '@cqlmap/config/src/ConfigSchema';
import {z} from 'zod';

export const DEFAULT_CONFIG: ConfigObject = {
	env: 'development',
	cassandra: {
		hosts: ['127.0.0.1'],
		keyspace: 'cqlmap',
		local_dc: 'datacenter1',
	},
	logging: {
		level: 'info',
	},
	mapping: {
		log_queries: false,
	},
};

let cachedConfig: CqlMapConfig | null = null;

export function getConfigPathsFromEnv(env: NodeJS.ProcessEnv = process.env): Array<string> {
	const value = env.CQLMAP_CONFIG;
	if (!value) return [];
	return value
		.split(',')
		.map((configPath) => configPath.trim())
		.filter((configPath) => configPath.length > 0);
}

async function findFirstExisting(paths: ReadonlyArray<string>): Promise<string | null> {
	for (const configPath of paths) {
		const exists = await access(configPath).then(
			() => true,
			() => false,
		);
		if (exists) return configPath;
	}
	return null;
}

function unwrapSchema(schema: z.ZodTypeAny): z.ZodTypeAny {
	if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return unwrapSchema(schema.unwrap());
	if (schema instanceof z.ZodDefault) return unwrapSchema(schema.removeDefault());
	if (schema instanceof z.ZodEffects) return unwrapSchema(schema.innerType());
	return schema;
}

function warnUnknownKeys(value: ConfigObject, schema: z.ZodTypeAny, path: string): void {
	const objectSchema = unwrapSchema(schema);
	if (!(objectSchema instanceof z.ZodObject)) return;

	const shape: z.ZodRawShape = objectSchema.shape;
	for (const [key, child] of Object.entries(value)) {
		const keyPath = path ? `${path}.${key}` : key;
		const childSchema = shape[key];
		if (!childSchema) {
			console.warn(`Unknown config property "${keyPath}" will be ignored`);
			continue;
		}
		if (isConfigObject(child)) {
			warnUnknownKeys(child, childSchema, keyPath);
		}
	}
}

function formatIssues(error: z.ZodError): string {
	return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export async function loadConfig(paths: ReadonlyArray<string>): Promise<CqlMapConfig> {
	if (paths.length === 0) {
		throw new Error('CQLMAP_CONFIG must be set to the path of a JSON config file');
	}

	const configPath = await findFirstExisting(paths);
	if (!configPath) {
		throw new Error(`No config file found (tried: ${paths.join(', ')})`);
	}

	const raw: unknown = JSON.parse(await readFile(configPath, 'utf8'));
	if (!isConfigObject(raw)) {
		throw new Error(`Config file ${configPath} must contain a JSON object`);
	}

	warnUnknownKeys(raw, CqlMapConfigSchema, '');

	const result = CqlMapConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, raw));
	if (!result.success) {
		throw new Error(`Invalid config in ${configPath}: ${formatIssues(result.error)}`);
	}

	cachedConfig = result.data;
	return cachedConfig;
}

export function getConfig(): CqlMapConfig {
	if (!cachedConfig) {
		throw new Error('Config not loaded');
	}
	return cachedConfig;
}

export function resetConfig(): void {
	cachedConfig = null;
}
