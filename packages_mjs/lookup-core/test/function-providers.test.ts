import { DataHash, NOT_FOUND, found } from '../src/domain';
import { LookupError } from '../src/errors';
import { Explainer } from '../src/explainer';
import { Invocation } from '../src/invocation';
import { ResolvedLocation } from '../src/location-resolver';
import { resetWarnOnce } from '../src/logger';
import { LookupKey } from '../src/lookup-key';
import { MergeStrategy } from '../src/merge-strategy';
import { DataDigFunctionProvider } from '../src/providers/data-dig-provider';
import { DataHashFunctionProvider } from '../src/providers/data-hash-provider';
import { ParentDataProvider } from '../src/providers/data-provider';
import { LookupKeyFunctionProvider } from '../src/providers/lookup-key-provider';
import {
    LegacyBackend,
    LegacyBackendV1,
    V3BackendFunctionProvider,
    convertMerge,
} from '../src/providers/v3-backend-provider';
import { V4DataHashFunctionProvider } from '../src/providers/v4-data-hash-provider';
import { VariableScope } from '../src/scope';
import { TestServices, makeServices } from './helpers';

const FIRST = MergeStrategy.strategy('first');

function uri(location: string): ResolvedLocation {
    return new ResolvedLocation(location, location, 'uri');
}

function invocation(explainer?: Explainer): Invocation {
    return new Invocation(new VariableScope({ name: 'world', env: 'prod' }), { explainer });
}

let services: TestServices;

beforeEach(() => {
    resetWarnOnce();
    services = makeServices();
});

describe('DataHashFunctionProvider', () => {
    it('reads the hash once per location and interpolates found values', () => {
        const fn = jest.fn((options: DataHash) => ({ greeting: 'hello %{name}', source: options.uri ?? null }));
        services.functions.registerDataHash('test_hash', fn);
        const provider = new DataHashFunctionProvider({
            name: 'Test',
            functionName: 'test_hash',
            services,
            options: { token: 'test-secret' },
            locations: [uri('mem://one')],
        });

        expect(provider.keyLookup(LookupKey.parse('greeting'), invocation(), FIRST)).toEqual(found('hello world'));
        expect(provider.keyLookup(LookupKey.parse('source'), invocation(), FIRST)).toEqual(found('mem://one'));
        expect(provider.keyLookup(LookupKey.parse('missing'), invocation(), FIRST)).toEqual(NOT_FOUND);
        expect(fn).toHaveBeenCalledTimes(1);
        expect(fn.mock.calls[0][0]).toEqual({ token: 'test-secret', uri: 'mem://one' });
    });

    it('merges values from several locations', () => {
        services.functions.registerDataHash('by_location', options =>
            options.uri === 'mem://a' ? { list: ['a', 'shared'] } : { list: ['shared', 'b'] });
        const provider = new DataHashFunctionProvider({
            name: 'Test',
            functionName: 'by_location',
            services,
            locations: [uri('mem://a'), uri('mem://b')],
        });

        expect(provider.keyLookup(LookupKey.parse('list'), invocation(), FIRST)).toEqual(found(['a', 'shared']));
        expect(provider.keyLookup(LookupKey.parse('list'), invocation(), MergeStrategy.strategy('unique')))
            .toEqual(found(['a', 'shared', 'b']));
    });

    it('reports locations that do not exist', () => {
        const fn = jest.fn(() => ({}));
        services.functions.registerDataHash('test_hash', fn);
        const provider = new DataHashFunctionProvider({
            name: 'Test',
            functionName: 'test_hash',
            services,
            locations: [new ResolvedLocation('missing.yaml', '/nonexistent/tiered-lookup/missing.yaml')],
        });
        const explainer = new Explainer();

        expect(provider.keyLookup(LookupKey.parse('a'), invocation(explainer), FIRST)).toEqual(NOT_FOUND);
        expect(fn).not.toHaveBeenCalled();
        expect(explainer.events()).toEqual(['Path not found']);
    });

    it('rejects functions that do not return a hash', () => {
        services.functions.registerDataHash('bad', () => ['not', 'a', 'hash']);
        const provider = new DataHashFunctionProvider({ name: 'Test', functionName: 'bad', services });

        expect(() => provider.keyLookup(LookupKey.parse('a'), invocation(), FIRST)).toThrow(LookupError);
        expect(() => provider.keyLookup(LookupKey.parse('a'), invocation(), FIRST))
            .toThrow("Value returned from data_hash function 'bad' has wrong type: expected a Hash of data, got Array");
    });

    it('fails for unknown functions', () => {
        const provider = new DataHashFunctionProvider({ name: 'Test', functionName: 'nope', services });
        expect(() => provider.keyLookup(LookupKey.parse('a'), invocation(), FIRST))
            .toThrow("Unable to find 'data_hash' function named 'nope'");
    });

    it('lets the parent filter the hash', () => {
        services.functions.registerDataHash('test_hash', () => ({ 'mod::a': 1, b: 2 }));
        const parent: ParentDataProvider = {
            name: 'Parent',
            moduleName: 'mod',
            keyLookup: () => NOT_FOUND,
            validateDataHash: jest.fn((hash: DataHash) => ({ 'mod::a': hash['mod::a'] })),
        };
        const provider = new DataHashFunctionProvider({ name: 'Test', functionName: 'test_hash', services, parent });

        expect(provider.keyLookup(LookupKey.parse('mod::a'), invocation(), FIRST)).toEqual(found(1));
        expect(provider.keyLookup(LookupKey.parse('b'), invocation(), FIRST)).toEqual(NOT_FOUND);
        expect(parent.validateDataHash).toHaveBeenCalledTimes(1);
    });

    it('explains found values', () => {
        services.functions.registerDataHash('test_hash', () => ({ a: 'x' }));
        const provider = new DataHashFunctionProvider({ name: 'Test', functionName: 'test_hash', services });
        const explainer = new Explainer();

        provider.keyLookup(LookupKey.parse('a'), invocation(explainer), FIRST);
        expect(explainer.events()).toEqual(['Found key: "a" value: "x"']);
        expect(explainer.explain()).toBe(['Data Provider Hierarchy entry "Test"', '  Found key: "a" value: "x"'].join('\n'));
    });
});

describe('DataDigFunctionProvider', () => {
    it('remembers found and not-found outcomes', () => {
        const fn = jest.fn((key: string) => (key === 'a' ? found('value of a') : NOT_FOUND));
        services.functions.registerDataDig('dig', fn);
        const provider = new DataDigFunctionProvider({ name: 'Dig', functionName: 'dig', services });

        for (let i = 0; i < 2; i++) {
            expect(provider.keyLookup(LookupKey.parse('a'), invocation(), FIRST)).toEqual(found('value of a'));
            expect(provider.keyLookup(LookupKey.parse('b'), invocation(), FIRST)).toEqual(NOT_FOUND);
        }
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('reports values as the function returned them', () => {
        services.functions.registerDataDig('dig', () => found('hello %{name}'));
        const provider = new DataDigFunctionProvider({ name: 'Dig', functionName: 'dig', services });

        expect(provider.keyLookup(LookupKey.parse('a'), invocation(), FIRST)).toEqual(found('hello %{name}'));
    });
});

describe('LookupKeyFunctionProvider', () => {
    it('remembers found values and asks again for missing ones', () => {
        const fn = jest.fn((key: string) => (key === 'a' ? found('value of a') : NOT_FOUND));
        services.functions.registerLookupKey('lk', fn);
        const provider = new LookupKeyFunctionProvider({ name: 'LK', functionName: 'lk', services });

        for (let i = 0; i < 2; i++) {
            provider.keyLookup(LookupKey.parse('a'), invocation(), FIRST);
            provider.keyLookup(LookupKey.parse('b'), invocation(), FIRST);
        }
        expect(fn.mock.calls.map(call => call[0])).toEqual(['a', 'b', 'b']);
    });

    it('gives functions a context for caching and interpolation', () => {
        services.functions.registerLookupKey('lk', (key, _options, context) => {
            if (!context.cacheHasKey(key)) {
                context.cache(key, context.interpolate(`${key} in %{env}`));
            }
            return context.found([context.environmentName, context.moduleName ?? 'none', context.cachedValue(key) ?? null]);
        });
        const provider = new LookupKeyFunctionProvider({ name: 'LK', functionName: 'lk', services });

        expect(provider.keyLookup(LookupKey.parse('a'), invocation(), FIRST)).toEqual(found(['test', 'none', 'a in prod']));
    });

    it('does not interpolate what the function already interpolated', () => {
        services.functions.registerLookupKey('lk', (_key, _options, context) =>
            context.found(context.interpolate("%{literal('%')}{name}")));
        const provider = new LookupKeyFunctionProvider({ name: 'LK', functionName: 'lk', services });

        expect(provider.keyLookup(LookupKey.parse('a'), invocation(), FIRST)).toEqual(found('%{name}'));
    });

    it('lets functions fill and list the cache in one go', () => {
        const seen: Array<Array<[string, unknown]>> = [];
        services.functions.registerLookupKey('preload', (key, _options, context) => {
            if (context.cachedEntries().length === 0) {
                context.cacheAll({ a: 'first', b: ['second'] });
            }
            seen.push(context.cachedEntries());
            return context.cacheHasKey(key) ? context.found(context.cachedValue(key) ?? null) : context.notFound();
        });
        const provider = new LookupKeyFunctionProvider({ name: 'LK', functionName: 'preload', services });

        expect(provider.keyLookup(LookupKey.parse('b'), invocation(), FIRST)).toEqual(found(['second']));
        expect(provider.keyLookup(LookupKey.parse('c'), invocation(), FIRST)).toEqual(NOT_FOUND);
        expect(seen).toEqual([
            [['a', 'first'], ['b', ['second']]],
            [['a', 'first'], ['b', ['second']]],
        ]);
    });

    it('rejects values that are not data', () => {
        services.functions.registerLookupKey('lk', () => found(Number.NaN));
        const provider = new LookupKeyFunctionProvider({ name: 'LK', functionName: 'lk', services });

        expect(() => provider.keyLookup(LookupKey.parse('a'), invocation(), FIRST))
            .toThrow('Value for key \'a\', returned from Hierarchy entry "LK" has wrong type: number');
    });
});

describe('V4DataHashFunctionProvider', () => {
    it('calls the legacy function with a context only', () => {
        const fn = jest.fn(() => ({ 'mod::a': 'legacy' }));
        services.functions.registerV4DataHash('mod::data', fn);
        const provider = new V4DataHashFunctionProvider({ name: 'Legacy', functionName: 'mod::data', services });

        expect(provider.functionKind).toBe('v4_data_hash');
        expect(provider.keyLookup(LookupKey.parse('mod::a'), invocation(), FIRST)).toEqual(found('legacy'));
        expect(fn).toHaveBeenCalledTimes(1);
    });
});

describe('V3BackendFunctionProvider', () => {
    const loadedConfig: DataHash = { backends: ['custom'] };

    function provider(): V3BackendFunctionProvider {
        return new V3BackendFunctionProvider({ name: 'custom', functionName: 'hiera_v3_data', services, loadedConfig });
    }

    it('converts merge strategies to resolution types', () => {
        expect(convertMerge(MergeStrategy.strategy('first'))).toBeUndefined();
        expect(convertMerge(MergeStrategy.strategy('unique'))).toBe('array');
        expect(convertMerge(MergeStrategy.strategy('hash'))).toEqual({ behavior: 'native' });
        expect(convertMerge(MergeStrategy.strategy({ strategy: 'deep', merge_hash_arrays: true })))
            .toEqual({ behavior: 'deeper', merge_hash_arrays: true });
        expect(convertMerge(MergeStrategy.strategy('reverse_deep'))).toEqual({ behavior: 'deep' });
    });

    it('creates the backend once and passes the merge along', () => {
        const backend: LegacyBackend = { lookup: jest.fn(() => found('from backend')) };
        const factory = jest.fn(() => backend);
        services.providers.registerLegacyBackend('custom', factory);
        const p = provider();
        const inv = invocation();

        expect(p.keyLookup(LookupKey.parse('a'), inv, MergeStrategy.strategy({ strategy: 'deep', knockout_prefix: '--' })))
            .toEqual(found('from backend'));
        p.keyLookup(LookupKey.parse('b'), inv, FIRST);

        expect(factory).toHaveBeenCalledTimes(1);
        expect(factory).toHaveBeenCalledWith(loadedConfig);
        expect(backend.lookup).toHaveBeenNthCalledWith(1, 'a', inv.scope, undefined, { behavior: 'deeper', knockout_prefix: '--' });
        expect(backend.lookup).toHaveBeenNthCalledWith(2, 'b', inv.scope, undefined, undefined);
    });

    it('wraps first generation backends', () => {
        const backend: LegacyBackendV1 = { apiVersion: 1, lookup: (key: string) => (key === 'a' ? 'v1 value' : null) };
        services.providers.registerLegacyBackend('custom', () => backend);
        const p = provider();

        expect(p.keyLookup(LookupKey.parse('a'), invocation(), FIRST)).toEqual(found('v1 value'));
        expect(p.keyLookup(LookupKey.parse('b'), invocation(), FIRST)).toEqual(NOT_FOUND);
    });

    it('is not found when no backend is registered', () => {
        const explainer = new Explainer();
        expect(provider().keyLookup(LookupKey.parse('a'), invocation(explainer), FIRST)).toEqual(NOT_FOUND);
        expect(explainer.events()).toEqual([
            "Unable to load backend 'custom': no backend with that name is registered",
            'No such key: "a"',
        ]);
    });

    it('warns when the backend cannot be created', () => {
        services.providers.registerLegacyBackend('custom', () => {
            throw new Error('missing gem');
        });
        expect(provider().keyLookup(LookupKey.parse('a'), invocation(), FIRST)).toEqual(NOT_FOUND);
        expect(services.logger.warn).toHaveBeenCalledWith("Unable to load backend 'custom': missing gem");
    });
});
