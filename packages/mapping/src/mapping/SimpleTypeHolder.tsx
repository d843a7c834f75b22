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

import {CASSANDRA_SIMPLE_TYPES} from '@cqlmap/mapping/src/mapping/CassandraSimpleTypes';
import {isAssignableFrom, type JsType} from '@cqlmap/mapping/src/types/JsType';

/**
 * Decides whether a type is stored as a single value rather than mapped property by
 * property. A type is simple when it is `Object`, one of the registered types, or a
 * subtype of one.
 */
export class SimpleTypeHolder {
	private readonly simpleTypes: ReadonlyArray<JsType>;
	private readonly cache = new Map<JsType, boolean>();

	constructor(customSimpleTypes: Iterable<JsType> = [], baseTypes: ReadonlyArray<JsType> = CASSANDRA_SIMPLE_TYPES) {
		const types: Array<JsType> = [...baseTypes];
		for (const type of customSimpleTypes) {
			if (!types.includes(type)) types.push(type);
		}
		this.simpleTypes = types;
		for (const type of types) {
			this.cache.set(type, true);
		}
	}

	isSimpleType(type: JsType): boolean {
		if (type === Object) return true;

		const cached = this.cache.get(type);
		if (cached !== undefined) return cached;

		const simple = this.simpleTypes.some((simpleType) => isAssignableFrom(simpleType, type));
		this.cache.set(type, simple);
		return simple;
	}

	getSimpleTypes(): ReadonlyArray<JsType> {
		return this.simpleTypes;
	}
}

export const CASSANDRA_SIMPLE_TYPE_HOLDER = new SimpleTypeHolder();
