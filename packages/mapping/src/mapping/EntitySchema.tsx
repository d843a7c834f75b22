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

import {MappingError} from '@cqlmap/errors/src/domains/mapping/MappingError';
import {type JsType, typeName} from '@cqlmap/mapping/src/types/JsType';

export type CollectionKind = 'list' | 'set';

export interface ColumnDefinition {
	/** Column name, defaults to the lowercased property name. */
	column?: string;
	/** Property type, or element type for collections. */
	type: JsType;
	collection?: CollectionKind;
	/** Cassandra-native type the value must be written as, when a writing converter offers several. */
	nativeType?: JsType;
}

export type ColumnDefinitions<T> = {
	readonly [K in keyof T & string]?: ColumnDefinition | JsType;
};

export interface PersistentProperty {
	readonly property: string;
	readonly column: string;
	readonly type: JsType;
	readonly collection: CollectionKind | null;
	readonly nativeType: JsType | null;
}

export interface EntitySchema<T extends object> {
	readonly name: string;
	readonly table: string;
	readonly properties: ReadonlyArray<PersistentProperty>;
	create(): T;
	getProperty(property: string): PersistentProperty | undefined;
}

export interface EntityDefinition<T extends object> {
	type: new () => T;
	/** Table name, defaults to the lowercased type name. */
	table?: string;
	columns: ColumnDefinitions<T>;
}

function isColumnDefinition(value: unknown): value is ColumnDefinition {
	if (typeof value !== 'object' || value === null) return false;
	if (!('type' in value) || typeof value.type !== 'function') return false;
	if ('column' in value && value.column !== undefined && typeof value.column !== 'string') return false;
	if ('collection' in value && value.collection !== undefined) {
		if (value.collection !== 'list' && value.collection !== 'set') return false;
	}
	if ('nativeType' in value && value.nativeType !== undefined && typeof value.nativeType !== 'function') return false;
	return true;
}

function toPersistentProperty(entity: string, property: string, definition: unknown): PersistentProperty {
	if (typeof definition === 'function') {
		return Object.freeze({property, column: property.toLowerCase(), type: definition, collection: null, nativeType: null});
	}

	if (isColumnDefinition(definition)) {
		return Object.freeze({
			property,
			column: definition.column ?? property.toLowerCase(),
			type: definition.type,
			collection: definition.collection ?? null,
			nativeType: definition.nativeType ?? null,
		});
	}

	throw new MappingError('Column definition must be a type or an object with a type', {entity, property});
}

export function defineEntity<T extends object>(definition: EntityDefinition<T>): EntitySchema<T> {
	const name = typeName(definition.type);
	const properties: Array<PersistentProperty> = [];
	const columns = new Set<string>();

	for (const property of Object.keys(definition.columns)) {
		const columnDefinition: unknown = Reflect.get(definition.columns, property);
		if (columnDefinition === undefined) continue;

		const persistentProperty = toPersistentProperty(name, property, columnDefinition);
		if (columns.has(persistentProperty.column)) {
			throw new MappingError(`Column "${persistentProperty.column}" is mapped more than once`, {
				entity: name,
				property,
				column: persistentProperty.column,
			});
		}
		columns.add(persistentProperty.column);
		properties.push(persistentProperty);
	}

	const byProperty = new Map(properties.map((property) => [property.property, property]));
	const EntityType = definition.type;

	return Object.freeze({
		name,
		table: definition.table ?? name.toLowerCase(),
		properties: Object.freeze(properties),
		create: () => new EntityType(),
		getProperty: (property: string) => byProperty.get(property),
	});
}
