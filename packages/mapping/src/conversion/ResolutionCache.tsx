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

import type {JsType} from '@cqlmap/mapping/src/types/JsType';

export type ResolvedTarget = {kind: 'found'; type: JsType} | {kind: 'notFound'};

const NOT_FOUND: ResolvedTarget = Object.freeze({kind: 'notFound'});

export const Resolved = {
	of(type: JsType | null): ResolvedTarget {
		return type ? {kind: 'found', type} : NOT_FOUND;
	},
	valueOf(resolved: ResolvedTarget): JsType | null {
		return resolved.kind === 'found' ? resolved.type : null;
	},
} as const;

export interface ResolutionStore<K> {
	get(key: K): ResolvedTarget | undefined;
	set(key: K, value: ResolvedTarget): void;
}

/**
 * Returns the cached resolution for `key`, computing and storing it on a miss. Negative
 * outcomes are stored too, so a type without a conversion is only scanned for once.
 */
export function getOrCreateAndCache<K>(key: K, cache: ResolutionStore<K>, producer: () => JsType | null): JsType | null {
	const cached = cache.get(key);
	if (cached) return Resolved.valueOf(cached);

	const type = producer();
	cache.set(key, Resolved.of(type));
	return type;
}
