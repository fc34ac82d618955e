import { createTestClass } from '@xdoc/sdk';
import { describe, expect, it } from 'vitest';
import { ClassFilter, matchesAnnotation, matchesInterface, matchesSuperclass } from '../filter.js';

// ─── Fixtures ────────────────────────────────────────────────────────────────

const grandBase = createTestClass('com.example.GrandBase');
const base = createTestClass('com.example.Base', { superclass: grandBase });
const widget = createTestClass('com.example.Widget', {
	superclass: base,
	interfaces: ['com.example.Named', 'com.example.Storable'],
	annotations: ['com.example.Api'],
});
const plain = createTestClass('com.example.Plain');

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('matchesSuperclass', () => {
	it('matches the direct superclass exactly', () => {
		expect(matchesSuperclass(widget, 'com.example.Base')).toBe(true);
	});

	it('does not follow ancestry', () => {
		expect(matchesSuperclass(widget, 'com.example.GrandBase')).toBe(false);
	});

	it('is false for classes without a superclass', () => {
		expect(matchesSuperclass(plain, 'com.example.Base')).toBe(false);
	});

	it('does not match simple names', () => {
		expect(matchesSuperclass(widget, 'Base')).toBe(false);
	});
});

describe('matchesInterface', () => {
	it('matches any directly declared interface', () => {
		expect(matchesInterface(widget, 'com.example.Storable')).toBe(true);
		expect(matchesInterface(widget, 'com.example.Named')).toBe(true);
	});

	it('does not look at interfaces of the superclass', () => {
		const parent = createTestClass('a.Parent', { interfaces: ['a.Iface'] });
		const child = createTestClass('a.Child', { superclass: parent });
		expect(matchesInterface(child, 'a.Iface')).toBe(false);
	});

	it('is false when no interfaces are declared', () => {
		expect(matchesInterface(plain, 'com.example.Named')).toBe(false);
	});
});

describe('matchesAnnotation', () => {
	it('matches on the annotation type qualified name', () => {
		expect(matchesAnnotation(widget, 'com.example.Api')).toBe(true);
		expect(matchesAnnotation(widget, 'com.example.Internal')).toBe(false);
		expect(matchesAnnotation(plain, 'com.example.Api')).toBe(false);
	});
});

describe('ClassFilter', () => {
	it('has no filter and includes everything without criteria', () => {
		const filter = new ClassFilter();

		expect(filter.hasFilter()).toBe(false);
		expect(filter.shouldInclude(widget)).toBe(true);
		expect(filter.shouldInclude(plain)).toBe(true);
	});

	it.each([
		[{ extendsType: 'x' }],
		[{ implementsType: 'x' }],
		[{ annotationType: 'x' }],
		[{ extendsType: 'x', implementsType: 'y', annotationType: 'z' }],
	])('hasFilter() is true for %o', (criteria) => {
		expect(new ClassFilter(criteria).hasFilter()).toBe(true);
	});

	it('includes direct subclasses only under -extends', () => {
		expect(new ClassFilter({ extendsType: 'com.example.Base' }).shouldInclude(widget)).toBe(true);
		expect(new ClassFilter({ extendsType: 'com.example.GrandBase' }).shouldInclude(widget)).toBe(
			false,
		);
	});

	it('excludes a class without interfaces under -implements', () => {
		const filter = new ClassFilter({ implementsType: 'com.example.Named' });

		expect(filter.shouldInclude(plain)).toBe(false);
		expect(filter.shouldInclude(widget)).toBe(true);
	});

	it('requires every configured dimension to match', () => {
		const all = new ClassFilter({
			extendsType: 'com.example.Base',
			implementsType: 'com.example.Named',
			annotationType: 'com.example.Api',
		});
		const wrongAnnotation = new ClassFilter({
			extendsType: 'com.example.Base',
			implementsType: 'com.example.Named',
			annotationType: 'com.example.Internal',
		});

		expect(all.shouldInclude(widget)).toBe(true);
		expect(wrongAnnotation.shouldInclude(widget)).toBe(false);
	});

	it('does not share criteria with the caller', () => {
		const criteria = { extendsType: 'com.example.Base' };
		const filter = new ClassFilter(criteria);
		criteria.extendsType = 'changed';

		expect(filter.criteria.extendsType).toBe('com.example.Base');
	});
});
