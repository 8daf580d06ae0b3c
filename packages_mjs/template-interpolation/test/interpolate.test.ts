import { resolvePath } from '../src/resolver';
import { extractExpressions } from '../src/extractor';
import { parsePath, parsePathSegments } from '../src/path-parser';
import { interpolate, interpolateString } from '../src/interpolate';
import { InterpolationError, SecurityError } from '../src/errors';
import { InterpolationContext, TemplateValue } from '../src/types';

function contextOf(vars: Record<string, TemplateValue>, data: Record<string, TemplateValue> = {}): InterpolationContext {
    return {
        lookupVariable: (name) => vars[name],
        lookupKey: (key) => data[key]
    };
}

describe('PathParser', () => {
    test('parse path', () => {
        expect(parsePath("a.b.c")).toEqual(["a", "b", "c"]);
        expect(parsePath("a[0].c")).toEqual(["a", "0", "c"]);
        expect(parsePath("a['b'].c")).toEqual(["a", "b", "c"]);
    });

    test('quoted segments keep dots', () => {
        expect(parsePathSegments('a."b.c".d')).toEqual([
            { text: 'a', quoted: false },
            { text: 'b.c', quoted: true },
            { text: 'd', quoted: false }
        ]);
    });

    test('malformed paths', () => {
        expect(() => parsePath('a..b')).toThrow("Empty segment in 'a..b'");
        expect(() => parsePath('a.')).toThrow(InterpolationError);
        expect(() => parsePath('a."b')).toThrow("Unterminated quote in 'a.\"b'");
        expect(() => parsePath('a[0')).toThrow("Unterminated bracket in 'a[0'");
    });
});

describe('Resolver', () => {
    test('nested object property', () => {
        const data = { a: { b: { c: "value" } } };
        expect(resolvePath(data, "a.b.c")).toBe("value");
    });

    test('array index', () => {
        const data = { items: ["first", "second"] };
        expect(resolvePath(data, "items[1]")).toBe("second");
        expect(resolvePath(data, "items.0")).toBe("first");
    });

    test('quoted index does not address arrays', () => {
        expect(resolvePath({ items: ["first"] }, 'items."0"')).toBeUndefined();
    });

    test('security error', () => {
        expect(() => resolvePath({}, "constructor")).toThrow(SecurityError);
        expect(() => resolvePath({}, "__proto__")).toThrow(SecurityError);
    });
});

describe('Extractor', () => {
    test('extract variable and method expressions', () => {
        const expressions = extractExpressions("%{::environment}/%{lookup('x::y')}");
        expect(expressions).toHaveLength(2);
        expect(expressions[0]).toMatchObject({ expression: '::environment', kind: 'VARIABLE', start: 0, end: 16 });
        expect(expressions[1]).toMatchObject({ kind: 'METHOD', method: 'lookup', argument: 'x::y' });
    });
});

describe('interpolateString', () => {
    const ctx = contextOf(
        { environment: 'production', facts: { os: { family: 'Debian' } }, port: 8080 },
        { 'app::list': ['a', 'b'], 'app::name': 'web' }
    );

    test('variables, top scope prefix and dotted navigation', () => {
        expect(interpolateString('%{environment}/%{::environment}', ctx)).toBe('production/production');
        expect(interpolateString('os/%{facts.os.family}.yaml', ctx)).toBe('os/Debian.yaml');
        expect(interpolateString('port=%{port}', ctx)).toBe('port=8080');
    });

    test('unknown variables expand to an empty string', () => {
        expect(interpolateString('nodes/%{trusted.certname}', ctx)).toBe('nodes/');
    });

    test('methods', () => {
        expect(interpolateString("%{literal('%')}{x}", ctx)).toBe('%{x}');
        expect(interpolateString("%{scope('environment')}", ctx)).toBe('production');
        expect(interpolateString("name=%{lookup('app::name')}", ctx)).toBe('name=web');
        expect(interpolateString('name=%{hiera("app::name")}', ctx)).toBe('name=web');
        expect(interpolateString("%{lookup('missing')}", ctx)).toBe('');
    });

    test('alias returns the raw value only for the whole string', () => {
        expect(interpolateString("%{alias('app::list')}", ctx)).toEqual(['a', 'b']);
        expect(() => interpolateString("x%{alias('app::list')}", ctx)).toThrow(InterpolationError);
    });

    test('methods can be disallowed', () => {
        expect(() => interpolateString("%{lookup('app::name')}", ctx, { allowMethods: false }))
            .toThrow("Interpolation using method syntax is not allowed in this context: '%{lookup('app::name')}'");
    });

    test('unknown method', () => {
        expect(() => interpolateString("%{eval('x')}", ctx)).toThrow("Unknown interpolation method 'eval'");
    });
});

describe('interpolate', () => {
    test('walks arrays and hashes including keys', () => {
        const ctx = contextOf({ env: 'dev' });
        expect(interpolate({ '%{env}_key': ['%{env}', 1, true, null] }, ctx))
            .toEqual({ dev_key: ['dev', 1, true, null] });
    });

    test('keeps a hash key named __proto__', () => {
        const ctx = contextOf({ env: 'dev' });
        const source: TemplateValue = JSON.parse('{"__proto__":"%{env}","other":"x"}');
        const result = interpolate(source, ctx);
        expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
        expect(Object.getOwnPropertyNames(result)).toEqual(['__proto__', 'other']);
        expect(Object.getOwnPropertyDescriptor(result, '__proto__')?.value).toBe('dev');
    });
});
