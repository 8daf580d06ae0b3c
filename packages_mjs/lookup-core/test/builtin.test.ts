import * as path from 'path';
import { FunctionContext, ProviderContext } from '../src/functions/context';
import { jsonData, yamlData } from '../src/functions/builtin';
import { FunctionRegistry } from '../src/functions/registry';
import { Invocation } from '../src/invocation';
import { VariableScope } from '../src/scope';
import { removeTree, tempTree } from './helpers';

describe('built-in data functions', () => {
    let root: string;
    const context = new ProviderContext(new FunctionContext('test', undefined), new Invocation(new VariableScope()));

    beforeAll(() => {
        root = tempTree({
            'common.yaml': 'port: 8080\nhosts: [a, b]\nenabled: true\n',
            'empty.yaml': '',
            'list.yaml': '- a\n- b\n',
            'broken.yaml': 'key: [unclosed\n',
            'common.json': '{"port": 8080, "nested": {"key": null}}',
            'broken.json': '{"port": ',
        });
    });

    afterAll(() => removeTree(root));

    it('reads yaml hashes', () => {
        expect(yamlData({ path: path.join(root, 'common.yaml') }, context)).toEqual({ port: 8080, hosts: ['a', 'b'], enabled: true });
    });

    it('treats an empty yaml file as an empty hash', () => {
        expect(yamlData({ path: path.join(root, 'empty.yaml') }, context)).toEqual({});
    });

    it('rejects yaml that is not a hash', () => {
        const file = path.join(root, 'list.yaml');
        expect(() => yamlData({ path: file }, context)).toThrow(`${file}: file does not contain a valid yaml hash`);
    });

    it('reports yaml syntax errors', () => {
        const file = path.join(root, 'broken.yaml');
        expect(() => yamlData({ path: file }, context)).toThrow(`Unable to parse ${file}`);
    });

    it('requires a path option', () => {
        expect(() => yamlData({}, context)).toThrow("The 'yaml_data' function requires a 'path' option");
        expect(() => jsonData({ uri: 'mem://x' }, context)).toThrow("The 'json_data' function requires a 'path' option");
    });

    it('reads json hashes', () => {
        expect(jsonData({ path: path.join(root, 'common.json') }, context)).toEqual({ port: 8080, nested: { key: null } });
    });

    it('reports json syntax errors', () => {
        const file = path.join(root, 'broken.json');
        expect(() => jsonData({ path: file }, context)).toThrow(`Unable to parse ${file}`);
    });

    it('are registered by default', () => {
        const registry = FunctionRegistry.withBuiltins();
        expect(registry.dataHash('yaml_data')).toBe(yamlData);
        expect(registry.dataHash('json_data')).toBe(jsonData);
        expect(() => registry.lookupKey('yaml_data')).toThrow("Unable to find 'lookup_key' function named 'yaml_data'");
    });
});
