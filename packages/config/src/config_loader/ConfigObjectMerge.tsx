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

export type ConfigValue = string | number | boolean | null | ConfigObject | Array<ConfigValue>;

export interface ConfigObject {
	[key: string]: ConfigValue;
}

export function isConfigObject(value: unknown): value is ConfigObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Merges `override` into a copy of `base`; nested objects merge, everything else is replaced. */
export function deepMerge(base: ConfigObject, override: ConfigObject): ConfigObject {
	const result: ConfigObject = {...base};
	for (const [key, value] of Object.entries(override)) {
		const current = result[key];
		result[key] = isConfigObject(current) && isConfigObject(value) ? deepMerge(current, value) : value;
	}
	return result;
}
