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
import {
	type ConverterCapabilities,
	isConverter,
	isConverterFactory,
	isGenericConverter,
} from '@cqlmap/mapping/src/conversion/Converter';
import {ConvertiblePair} from '@cqlmap/mapping/src/conversion/ConvertiblePair';

export interface ConverterDescriptor {
	readonly converterName: string;
	readonly pair: ConvertiblePair;
	readonly isReading: boolean;
	readonly isWriting: boolean;
}

function describe(
	converter: Partial<ConverterCapabilities> & {name: string},
	pair: ConvertiblePair,
): ConverterDescriptor {
	return Object.freeze({
		converterName: converter.name,
		pair,
		isReading: converter.reading === true,
		isWriting: converter.writing === true,
	});
}

/**
 * Resolves a converter into one descriptor per pair it handles. Generic converters
 * contribute every declared pair, factories and plain converters exactly one.
 */
export function extractConverterDescriptors(converter: unknown): ReadonlyArray<ConverterDescriptor> {
	if (isGenericConverter(converter)) {
		const pairs = converter.getConvertibleTypes() ?? [];
		return pairs.map((pair) => describe(converter, pair));
	}

	if (isConverterFactory(converter)) {
		return [describe(converter, new ConvertiblePair(converter.sourceType, converter.targetType))];
	}

	if (isConverter(converter)) {
		return [describe(converter, new ConvertiblePair(converter.sourceType, converter.targetType))];
	}

	throw new UnsupportedConverterKindError(converter);
}
