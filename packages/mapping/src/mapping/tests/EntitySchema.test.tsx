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
import {defineEntity} from '@cqlmap/mapping/src/mapping/EntitySchema';
import {DateTime} from 'luxon';
import {describe, expect, test} from 'vitest';

class SensorReading {
	sensor = '';
	takenAt: DateTime | null = null;
	tags: Set<string> = new Set();
}

describe('defineEntity', () => {
	test('derives table and column names from the type and properties', () => {
		const schema = defineEntity({
			type: SensorReading,
			columns: {
				sensor: String,
				takenAt: DateTime,
				tags: {type: String, collection: 'set'},
			},
		});

		expect(schema.name).toBe('SensorReading');
		expect(schema.table).toBe('sensorreading');
		expect(schema.properties).toEqual([
			{property: 'sensor', column: 'sensor', type: String, collection: null, nativeType: null},
			{property: 'takenAt', column: 'takenat', type: DateTime, collection: null, nativeType: null},
			{property: 'tags', column: 'tags', type: String, collection: 'set', nativeType: null},
		]);
	});

	test('explicit names override the defaults', () => {
		const schema = defineEntity({
			type: SensorReading,
			table: 'sensor_readings',
			columns: {takenAt: {column: 'taken_at', type: DateTime, nativeType: Date}},
		});

		expect(schema.table).toBe('sensor_readings');
		expect(schema.getProperty('takenAt')).toEqual({
			property: 'takenAt',
			column: 'taken_at',
			type: DateTime,
			collection: null,
			nativeType: Date,
		});
		expect(schema.getProperty('sensor')).toBeUndefined();
	});

	test('create returns a fresh instance each time', () => {
		const schema = defineEntity({type: SensorReading, columns: {sensor: String}});
		const first = schema.create();
		expect(first).toBeInstanceOf(SensorReading);
		expect(schema.create()).not.toBe(first);
	});

	test('rejects two properties mapped to one column', () => {
		expect(() =>
			defineEntity({
				type: SensorReading,
				columns: {sensor: {column: 'value', type: String}, takenAt: {column: 'value', type: DateTime}},
			}),
		).toThrow(MappingError);
		expect(() =>
			defineEntity({
				type: SensorReading,
				columns: {sensor: {column: 'value', type: String}, takenAt: {column: 'value', type: DateTime}},
			}),
		).toThrow('SensorReading.takenAt: Column "value" is mapped more than once');
	});
});
