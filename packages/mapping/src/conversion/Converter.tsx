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

import type {ConvertiblePair} from '@cqlmap/mapping/src/conversion/ConvertiblePair';
import {type JsType, typeName, type ValueOf} from '@cqlmap/mapping/src/types/JsType';

/**
 * Direction flags. A reading converter turns a Cassandra-native value into a domain value,
 * a writing converter turns a domain value into a Cassandra-native one.
 */
export interface ConverterCapabilities {
	readonly reading: boolean;
	readonly writing: boolean;
}

export interface Converter<S extends JsType = JsType, T extends JsType = JsType> extends ConverterCapabilities {
	readonly kind: 'converter';
	readonly name: string;
	readonly sourceType: S;
	readonly targetType: T;
	convert(source: ValueOf<S>): ValueOf<T>;
}

/**
 * Converts a source type into any member of a target type family, e.g. a string into
 * whichever subclass of a base class is requested.
 */
export interface ConverterFactory<S extends JsType = JsType, R extends JsType = JsType> extends ConverterCapabilities {
	readonly kind: 'factory';
	readonly name: string;
	readonly sourceType: S;
	readonly targetType: R;
	getConverter(targetType: JsType): Converter<S> | null;
}

/** Declares its convertible pairs explicitly and converts between any of them. */
export interface GenericConverter extends ConverterCapabilities {
	readonly kind: 'generic';
	readonly name: string;
	getConvertibleTypes(): ReadonlyArray<ConvertiblePair> | null;
	convert(source: unknown, sourceType: JsType, targetType: JsType): unknown;
}

export type AnyConverter = Converter | ConverterFactory | GenericConverter;

interface DirectionOptions {
	name?: string;
	reading?: boolean;
	writing?: boolean;
}

export interface ConversionDefinition<S extends JsType, T extends JsType> {
	name?: string;
	sourceType: S;
	targetType: T;
	convert(source: ValueOf<S>): ValueOf<T>;
}

export interface ConverterDefinition<S extends JsType, T extends JsType>
	extends ConversionDefinition<S, T>,
		DirectionOptions {}

export interface ConverterFactoryDefinition<S extends JsType, R extends JsType> extends DirectionOptions {
	sourceType: S;
	targetType: R;
	getConverter(targetType: JsType): Converter<S> | null;
}

export interface GenericConverterDefinition extends DirectionOptions {
	name: string;
	convertibleTypes: ReadonlyArray<ConvertiblePair>;
	convert(source: unknown, sourceType: JsType, targetType: JsType): unknown;
}

export function defineConverter<S extends JsType, T extends JsType>(
	definition: ConverterDefinition<S, T>,
): Converter<S, T> {
	const converter: Converter<S, T> = {
		kind: 'converter',
		name: definition.name ?? `${typeName(definition.sourceType)}To${typeName(definition.targetType)}Converter`,
		sourceType: definition.sourceType,
		targetType: definition.targetType,
		reading: definition.reading ?? false,
		writing: definition.writing ?? false,
		convert: (source: ValueOf<S>) => definition.convert(source),
	};
	return Object.freeze(converter);
}

export function readingConverter<S extends JsType, T extends JsType>(
	definition: ConversionDefinition<S, T>,
): Converter<S, T> {
	return defineConverter<S, T>({...definition, reading: true});
}

export function writingConverter<S extends JsType, T extends JsType>(
	definition: ConversionDefinition<S, T>,
): Converter<S, T> {
	return defineConverter<S, T>({...definition, writing: true});
}

export function defineConverterFactory<S extends JsType, R extends JsType>(
	definition: ConverterFactoryDefinition<S, R>,
): ConverterFactory<S, R> {
	const factory: ConverterFactory<S, R> = {
		kind: 'factory',
		name: definition.name ?? `${typeName(definition.sourceType)}To${typeName(definition.targetType)}ConverterFactory`,
		sourceType: definition.sourceType,
		targetType: definition.targetType,
		reading: definition.reading ?? false,
		writing: definition.writing ?? false,
		getConverter: (targetType: JsType) => definition.getConverter(targetType),
	};
	return Object.freeze(factory);
}

export function defineGenericConverter(definition: GenericConverterDefinition): GenericConverter {
	const convertibleTypes = [...definition.convertibleTypes];
	const converter: GenericConverter = {
		kind: 'generic',
		name: definition.name,
		reading: definition.reading ?? false,
		writing: definition.writing ?? false,
		getConvertibleTypes: () => convertibleTypes,
		convert: (source: unknown, sourceType: JsType, targetType: JsType) =>
			definition.convert(source, sourceType, targetType),
	};
	return Object.freeze(converter);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null;
}

function isJsType(value: unknown): value is JsType {
	return typeof value === 'function';
}

export function isGenericConverter(value: unknown): value is GenericConverter {
	return (
		isRecord(value) &&
		value.kind === 'generic' &&
		typeof value.getConvertibleTypes === 'function' &&
		typeof value.convert === 'function'
	);
}

export function isConverterFactory(value: unknown): value is ConverterFactory {
	return (
		isRecord(value) &&
		value.kind === 'factory' &&
		isJsType(value.sourceType) &&
		isJsType(value.targetType) &&
		typeof value.getConverter === 'function'
	);
}

export function isConverter(value: unknown): value is Converter {
	return (
		isRecord(value) &&
		value.kind === 'converter' &&
		isJsType(value.sourceType) &&
		isJsType(value.targetType) &&
		typeof value.convert === 'function'
	);
}
