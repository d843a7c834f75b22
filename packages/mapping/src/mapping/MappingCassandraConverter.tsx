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

import {ConverterNotFoundError} from '@cqlmap/errors/src/domains/conversion/ConverterNotFoundError';
import {MappingError} from '@cqlmap/errors/src/domains/mapping/MappingError';
import {ConversionService} from '@cqlmap/mapping/src/conversion/ConversionService';
import {CustomConversions} from '@cqlmap/mapping/src/conversion/CustomConversions';
import type {EntitySchema, PersistentProperty} from '@cqlmap/mapping/src/mapping/EntitySchema';
import {SimpleTypeHolder} from '@cqlmap/mapping/src/mapping/SimpleTypeHolder';
import {isAssignableFrom, type JsType, typeName, typeOfValue} from '@cqlmap/mapping/src/types/JsType';

export type CassandraRow = Readonly<Record<string, unknown>>;

export type CassandraValues = Record<string, unknown>;

/**
 * Reads rows into entities and writes entities into column values, consulting the
 * registered custom conversions before falling back to values the driver handles natively.
 */
export class MappingCassandraConverter {
	private readonly conversionService: ConversionService;
	private readonly simpleTypeHolder: SimpleTypeHolder;

	constructor(
		private readonly conversions: CustomConversions = new CustomConversions(),
		conversionService: ConversionService = new ConversionService(),
	) {
		conversions.registerConvertersIn(conversionService);
		this.conversionService = conversionService;
		this.simpleTypeHolder = new SimpleTypeHolder(conversions.getCustomSimpleTypes());
	}

	getCustomConversions(): CustomConversions {
		return this.conversions;
	}

	getConversionService(): ConversionService {
		return this.conversionService;
	}

	isSimpleType(type: JsType): boolean {
		return this.simpleTypeHolder.isSimpleType(type);
	}

	read<T extends object>(schema: EntitySchema<T>, row: CassandraRow): T {
		const values: Record<string, unknown> = {};

		for (const property of schema.properties) {
			if (!Object.hasOwn(row, property.column)) continue;
			values[property.property] = this.withContext(schema, property, () =>
				this.readProperty(row[property.column], property),
			);
		}

		return Object.assign(schema.create(), values);
	}

	write<T extends object>(schema: EntitySchema<T>, entity: T): CassandraValues {
		const values: CassandraValues = {};

		for (const property of schema.properties) {
			const value: unknown = Reflect.get(entity, property.property);
			values[property.column] = this.withContext(schema, property, () =>
				this.writeValue(value, property.nativeType),
			);
		}

		return values;
	}

	readValue(value: unknown, targetType: JsType): unknown {
		if (value === null || value === undefined) return null;

		const sourceType = typeOfValue(value);
		if (this.conversions.hasCustomReadTarget(sourceType, targetType)) {
			return this.conversionService.convert(value, targetType);
		}
		if (isAssignableFrom(targetType, sourceType)) return value;

		return this.conversionService.convert(value, targetType);
	}

	writeValue(value: unknown, requestedTargetType?: JsType | null): unknown {
		if (value === null || value === undefined) return null;

		const sourceType = typeOfValue(value);
		const targetType = this.conversions.getCustomWriteTarget(sourceType, requestedTargetType);
		if (targetType) return this.conversionService.convert(value, targetType);

		if (Array.isArray(value)) return value.map((element: unknown) => this.writeValue(element, requestedTargetType));
		if (value instanceof Set) {
			return new Set(Array.from(value, (element: unknown) => this.writeValue(element, requestedTargetType)));
		}
		if (value instanceof Map) {
			return new Map(
				Array.from(value, ([key, element]: [unknown, unknown]): [unknown, unknown] => [
					this.writeValue(key),
					this.writeValue(element),
				]),
			);
		}

		if (this.simpleTypeHolder.isSimpleType(sourceType)) return value;

		throw new ConverterNotFoundError(typeName(sourceType), 'a Cassandra supported type');
	}

	private readProperty(value: unknown, property: PersistentProperty): unknown {
		if (value === null || value === undefined) return null;

		switch (property.collection) {
			case 'list':
				return this.readElements(value, property).map((element) => this.readValue(element, property.type));
			case 'set':
				return new Set(this.readElements(value, property).map((element) => this.readValue(element, property.type)));
			default:
				return this.readValue(value, property.type);
		}
	}

	private readElements(value: unknown, property: PersistentProperty): Array<unknown> {
		if (Array.isArray(value)) return value;
		if (value instanceof Set) return Array.from(value);
		throw new ConverterNotFoundError(typeName(typeOfValue(value)), `${property.collection} of ${typeName(property.type)}`);
	}

	private withContext<T extends object, R>(schema: EntitySchema<T>, property: PersistentProperty, fn: () => R): R {
		try {
			return fn();
		} catch (error) {
			if (error instanceof MappingError) throw error;
			const message = error instanceof Error ? error.message : String(error);
			throw new MappingError(message, {entity: schema.name, property: property.property, column: property.column}, error);
		}
	}
}
