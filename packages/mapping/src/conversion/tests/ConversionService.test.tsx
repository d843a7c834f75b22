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
import {ConversionService} from '@cqlmap/mapping/src/conversion/ConversionService';
import {
	defineConverter,
	defineConverterFactory,
	defineGenericConverter,
} from '@cqlmap/mapping/src/conversion/Converter';
import {ConvertiblePair} from '@cqlmap/mapping/src/conversion/ConvertiblePair';
import {describe, expect, test} from 'vitest';

class Quantity {
	constructor(readonly amount: number) {}
}
class Count extends Quantity {}

const QuantityToString = defineConverter({
	sourceType: Quantity,
	targetType: String,
	convert: (quantity) => `${quantity.amount}`,
});

describe('ConversionService', () => {
	test('null and undefined convert to null', () => {
		const service = new ConversionService();
		expect(service.convert(null, String)).toBeNull();
		expect(service.convert(undefined, String)).toBeNull();
	});

	test('values already of the target type pass through', () => {
		const service = new ConversionService();
		const count = new Count(2);
		expect(service.convert('text', String)).toBe('text');
		expect(service.convert(count, Quantity)).toBe(count);
		expect(service.canConvert(Count, Quantity)).toBe(true);
	});

	test('throws when no converter applies', () => {
		const service = new ConversionService();
		expect(() => service.convert(new Quantity(1), Number)).toThrow(ConverterNotFoundError);
		expect(() => service.convert(new Quantity(1), Number)).toThrow(
			'No converter found capable of converting from Quantity to Number',
		);
		expect(service.canConvert(Quantity, Number)).toBe(false);
	});

	test('converters registered for a supertype apply to subtypes', () => {
		const service = new ConversionService();
		service.addConverter(QuantityToString);
		expect(service.convert(new Count(4), String)).toBe('4');
		expect(service.canConvert(Count, String)).toBe(true);
	});

	test('a converter added later takes precedence', () => {
		const service = new ConversionService();
		service.addConverter(QuantityToString);
		expect(service.convert(new Quantity(5), String)).toBe('5');

		service.addConverter(
			defineConverter({sourceType: Quantity, targetType: String, convert: (quantity) => `qty:${quantity.amount}`}),
		);
		expect(service.convert(new Quantity(5), String)).toBe('qty:5');
	});

	test('a more specific source registration wins over a supertype one', () => {
		const service = new ConversionService();
		service.addConverter(defineConverter({sourceType: Count, targetType: String, convert: () => 'count'}));
		service.addConverter(QuantityToString);
		expect(service.convert(new Count(1), String)).toBe('count');
		expect(service.convert(new Quantity(1), String)).toBe('1');
	});

	test('factories produce converters for members of the target family', () => {
		const service = new ConversionService();
		service.addConverterFactory(
			defineConverterFactory({
				sourceType: String,
				targetType: Quantity,
				getConverter: (targetType) =>
					targetType === Count
						? defineConverter({sourceType: String, targetType: Count, convert: (value) => new Count(Number(value))})
						: null,
			}),
		);

		const converted = service.convert('9', Count);
		expect(converted).toBeInstanceOf(Count);
		expect(converted).toEqual(new Count(9));
		expect(service.canConvert(String, Quantity)).toBe(false);
	});

	test('generic converters convert between every declared pair', () => {
		const service = new ConversionService();
		service.addGenericConverter(
			defineGenericConverter({
				name: 'TextNumberConverter',
				convertibleTypes: [new ConvertiblePair(String, Number), new ConvertiblePair(Number, String)],
				convert: (source, _sourceType, targetType) => (targetType === Number ? Number(source) : String(source)),
			}),
		);

		expect(service.convert('12', Number)).toBe(12);
		expect(service.convert(12, String)).toBe('12');
	});

	test('failures inside a converter are wrapped', () => {
		const service = new ConversionService();
		service.addConverter(
			defineConverter({
				sourceType: String,
				targetType: Number,
				convert: (value) => {
					throw new Error(`cannot parse ${value}`);
				},
			}),
		);

		let thrown: unknown = null;
		try {
			service.convert('abc', Number);
		} catch (error) {
			thrown = error;
		}

		expect(thrown).toBeInstanceOf(ConversionFailedError);
		expect(thrown).toHaveProperty('message', 'Failed to convert from String to Number: cannot parse abc');
		expect(thrown).toHaveProperty('code', 'conversion_failed');
	});
});
