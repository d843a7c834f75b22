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

import {UnsupportedConverterKindError} from '@cqlmap/errors/src/domains/conversion/UnsupportedConverterKindError';
import {createComponentLogger} from '@cqlmap/logger/src/Logger';
import type {ILogger} from '@cqlmap/logger/src/ILogger';
import type {ConversionService} from '@cqlmap/mapping/src/conversion/ConversionService';
import {
	type AnyConverter,
	isConverter,
	isConverterFactory,
	isGenericConverter,
} from '@cqlmap/mapping/src/conversion/Converter';
import {type ConverterDescriptor, extractConverterDescriptors} from '@cqlmap/mapping/src/conversion/ConverterDescriptor';
import {ConvertiblePair, ConvertiblePairSet, TypePairMap} from '@cqlmap/mapping/src/conversion/ConvertiblePair';
import {getDefaultConverters} from '@cqlmap/mapping/src/conversion/converters/DefaultConverters';
import {resolveCustomTarget} from '@cqlmap/mapping/src/conversion/CustomTargetResolver';
import {getOrCreateAndCache, type ResolutionStore, type ResolvedTarget} from '@cqlmap/mapping/src/conversion/ResolutionCache';
import {CASSANDRA_SIMPLE_TYPE_HOLDER, SimpleTypeHolder} from '@cqlmap/mapping/src/mapping/SimpleTypeHolder';
import {type JsType, typeName} from '@cqlmap/mapping/src/types/JsType';

export interface CustomConversionsOptions {
	logger?: ILogger;
	/** Defaults to the built-in groups. Pass an empty array to register user converters only. */
	defaultConverters?: ReadonlyArray<AnyConverter>;
}

class PairResolutionStore implements ResolutionStore<ConvertiblePair> {
	private readonly entries = new TypePairMap<ResolvedTarget>();

	get(key: ConvertiblePair): ResolvedTarget | undefined {
		return this.entries.get(key.sourceType, key.targetType);
	}

	set(key: ConvertiblePair, value: ResolvedTarget): void {
		this.entries.set(key.sourceType, key.targetType, value);
	}
}

/**
 * The custom conversions registered for an application. Registration builds two sets of
 * convertible pairs: reading pairs, which turn Cassandra-native values into domain types,
 * and writing pairs, which turn domain types into Cassandra-native values. The source type
 * of every writing pair is treated as a simple type since it never needs nested mapping.
 *
 * User converters are registered ahead of the built-in ones, and registration order decides
 * which pair wins when several match, so user converters override the defaults.
 */
export class CustomConversions {
	private readonly logger: ILogger;
	private readonly readingPairs = new ConvertiblePairSet();
	private readonly writingPairs = new ConvertiblePairSet();
	private readonly customSimpleTypes = new Set<JsType>();
	private readonly converters: ReadonlyArray<AnyConverter>;
	private readonly simpleTypeHolder: SimpleTypeHolder = CASSANDRA_SIMPLE_TYPE_HOLDER;

	private readonly customReadTargetTypes = new PairResolutionStore();
	private readonly customWriteTargetTypes = new PairResolutionStore();
	private readonly rawWriteTargetTypes = new Map<JsType, ResolvedTarget>();

	constructor(converters: ReadonlyArray<AnyConverter> = [], options: CustomConversionsOptions = {}) {
		this.logger = options.logger ?? createComponentLogger('custom-conversions');

		const toRegister: Array<AnyConverter> = [...converters, ...(options.defaultConverters ?? getDefaultConverters())];

		for (const converter of toRegister) {
			for (const descriptor of extractConverterDescriptors(converter)) {
				this.register(descriptor);
			}
		}

		this.converters = Object.freeze(toRegister.reverse());
	}

	isSimpleType(type: JsType): boolean {
		return this.simpleTypeHolder.isSimpleType(type);
	}

	getSimpleTypeHolder(): SimpleTypeHolder {
		return this.simpleTypeHolder;
	}

	getCustomSimpleTypes(): ReadonlySet<JsType> {
		return new Set(this.customSimpleTypes);
	}

	getReadingPairs(): ReadonlyArray<ConvertiblePair> {
		return this.readingPairs.toArray();
	}

	getWritingPairs(): ReadonlyArray<ConvertiblePair> {
		return this.writingPairs.toArray();
	}

	/** All registered converters, built-ins first, user converters last. */
	getConverters(): ReadonlyArray<AnyConverter> {
		return this.converters;
	}

	/**
	 * Hands every registered converter to `conversionService`. Converters are added built-ins
	 * first so that user converters, added last, take precedence there as well.
	 */
	registerConvertersIn(conversionService: ConversionService): void {
		for (const converter of this.converters) {
			if (isGenericConverter(converter)) {
				conversionService.addGenericConverter(converter);
			} else if (isConverterFactory(converter)) {
				conversionService.addConverterFactory(converter);
			} else if (isConverter(converter)) {
				conversionService.addConverter(converter);
			} else {
				throw new UnsupportedConverterKindError(converter);
			}
		}
	}

	/**
	 * Returns the Cassandra-native type a custom writing conversion turns `sourceType` into,
	 * optionally narrowed to one assignable to `requestedTargetType`. The result may be more
	 * general than the requested type.
	 */
	getCustomWriteTarget(sourceType: JsType, requestedTargetType?: JsType | null): JsType | null {
		if (!requestedTargetType) {
			return getOrCreateAndCache(sourceType, this.rawWriteTargetTypes, () =>
				resolveCustomTarget(sourceType, null, this.writingPairs),
			);
		}

		return getOrCreateAndCache(
			this.pairKey(sourceType, requestedTargetType),
			this.customWriteTargetTypes,
			() => resolveCustomTarget(sourceType, requestedTargetType, this.writingPairs),
		);
	}

	hasCustomWriteTarget(sourceType: JsType, requestedTargetType?: JsType | null): boolean {
		return this.getCustomWriteTarget(sourceType, requestedTargetType) !== null;
	}

	/**
	 * Returns the domain type a custom reading conversion produces from `sourceType` that is
	 * assignable to `requestedTargetType`, or null without one.
	 */
	getCustomReadTarget(sourceType: JsType, requestedTargetType: JsType | null | undefined): JsType | null {
		if (!requestedTargetType) return null;

		return getOrCreateAndCache(
			this.pairKey(sourceType, requestedTargetType),
			this.customReadTargetTypes,
			() => resolveCustomTarget(sourceType, requestedTargetType, this.readingPairs),
		);
	}

	hasCustomReadTarget(sourceType: JsType, requestedTargetType: JsType | null | undefined): boolean {
		return this.getCustomReadTarget(sourceType, requestedTargetType) !== null;
	}

	private register(descriptor: ConverterDescriptor): void {
		const {pair} = descriptor;

		if (descriptor.isReading) {
			this.readingPairs.add(pair);

			if (!CASSANDRA_SIMPLE_TYPE_HOLDER.isSimpleType(pair.sourceType)) {
				this.logger.warn(
					{converter: descriptor.converterName, sourceType: typeName(pair.sourceType), targetType: typeName(pair.targetType)},
					`Registering converter from ${pair.toString()} as reading converter although it doesn't convert from a Cassandra supported type`,
				);
			}
		}

		if (descriptor.isWriting) {
			this.writingPairs.add(pair);
			this.customSimpleTypes.add(pair.sourceType);

			if (!CASSANDRA_SIMPLE_TYPE_HOLDER.isSimpleType(pair.targetType)) {
				this.logger.warn(
					{converter: descriptor.converterName, sourceType: typeName(pair.sourceType), targetType: typeName(pair.targetType)},
					`Registering converter from ${pair.toString()} as writing converter although it doesn't convert to a Cassandra supported type`,
				);
			}
		}
	}

	private pairKey(sourceType: JsType, targetType: JsType): ConvertiblePair {
		return new ConvertiblePair(sourceType, targetType);
	}
}
