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

import {ConversionFailedError} from '@cqlmap/errors/src/domains/conversion/ConversionFailedError';
import {ConverterNotFoundError} from '@cqlmap/errors/src/domains/conversion/ConverterNotFoundError';
import type {Converter, ConverterFactory, GenericConverter} from '@cqlmap/mapping/src/conversion/Converter';
import {TypePairMap} from '@cqlmap/mapping/src/conversion/ConvertiblePair';
import {getTypeHierarchy, isAssignableFrom, type JsType, typeName, typeOfValue} from '@cqlmap/mapping/src/types/JsType';

type ConvertFunction = (source: unknown) => unknown;

interface ConverterEntry {
	/** Returns a conversion for the concrete pair, or null when this entry does not apply. */
	resolve(sourceType: JsType, targetType: JsType, registeredTargetType: JsType): ConvertFunction | null;
}

type CachedLookup = {kind: 'match'; convert: ConvertFunction} | {kind: 'noMatch'};

const NO_MATCH: CachedLookup = Object.freeze({kind: 'noMatch'});

/**
 * Executes conversions with the converters handed to it. Converters added later take
 * precedence over earlier ones registered for the same pair. Lookups walk the source type
 * hierarchy, then the target type hierarchy, most specific first.
 */
export class ConversionService {
	private readonly converters = new TypePairMap<Array<ConverterEntry>>();
	private lookupCache = new TypePairMap<CachedLookup>();

	addConverter(converter: Converter): void {
		this.register(converter.sourceType, converter.targetType, {
			resolve: (_sourceType, targetType, registeredTargetType) =>
				targetType === registeredTargetType ? (source) => converter.convert(source) : null,
		});
	}

	addConverterFactory(factory: ConverterFactory): void {
		this.register(factory.sourceType, factory.targetType, {
			resolve: (_sourceType, targetType) => {
				const converter = factory.getConverter(targetType);
				return converter ? (source) => converter.convert(source) : null;
			},
		});
	}

	addGenericConverter(converter: GenericConverter): void {
		for (const pair of converter.getConvertibleTypes() ?? []) {
			this.register(pair.sourceType, pair.targetType, {
				resolve: (sourceType, targetType, registeredTargetType) =>
					targetType === registeredTargetType ? (source) => converter.convert(source, sourceType, targetType) : null,
			});
		}
	}

	canConvert(sourceType: JsType, targetType: JsType): boolean {
		return this.getConversion(sourceType, targetType) !== null || isAssignableFrom(targetType, sourceType);
	}

	convert(value: unknown, targetType: JsType): unknown {
		if (value === null || value === undefined) return null;

		const sourceType = typeOfValue(value);
		const convert = this.getConversion(sourceType, targetType);

		if (!convert) {
			if (isAssignableFrom(targetType, sourceType)) return value;
			throw new ConverterNotFoundError(typeName(sourceType), typeName(targetType));
		}

		try {
			return convert(value);
		} catch (error) {
			throw new ConversionFailedError(typeName(sourceType), typeName(targetType), error);
		}
	}

	private register(sourceType: JsType, targetType: JsType, entry: ConverterEntry): void {
		const entries = this.converters.get(sourceType, targetType);
		if (entries) {
			entries.unshift(entry);
		} else {
			this.converters.set(sourceType, targetType, [entry]);
		}
		this.lookupCache = new TypePairMap();
	}

	private getConversion(sourceType: JsType, targetType: JsType): ConvertFunction | null {
		let cached = this.lookupCache.get(sourceType, targetType);
		if (!cached) {
			const convert = this.findConversion(sourceType, targetType);
			cached = convert ? {kind: 'match', convert} : NO_MATCH;
			this.lookupCache.set(sourceType, targetType, cached);
		}
		return cached.kind === 'match' ? cached.convert : null;
	}

	private findConversion(sourceType: JsType, targetType: JsType): ConvertFunction | null {
		const targetHierarchy = getTypeHierarchy(targetType);
		for (const registeredSourceType of getTypeHierarchy(sourceType)) {
			for (const registeredTargetType of targetHierarchy) {
				const entries = this.converters.get(registeredSourceType, registeredTargetType);
				if (!entries) continue;
				for (const entry of entries) {
					const convert = entry.resolve(sourceType, targetType, registeredTargetType);
					if (convert) return convert;
				}
			}
		}
		return null;
	}
}
