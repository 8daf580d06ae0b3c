import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Environment } from '../src/environment';
import { FunctionRegistry } from '../src/functions/registry';
import { Logger } from '../src/logger';
import { InMemoryProviderRegistry } from '../src/registry';
import { LookupServices } from '../src/services';
import { LookupSettingsInput, loadSettings } from '../src/settings';

export const FIXTURES = path.join(__dirname, 'fixtures');
export const GLOBAL_CONFIG = path.join(FIXTURES, 'global', 'hiera.yaml');
export const PRODUCTION = path.join(FIXTURES, 'environments', 'production');

export type MockLogger = { [K in keyof Logger]: jest.Mock };

export function mockLogger(): MockLogger {
    return {
        error: jest.fn(),
        warn: jest.fn(),
        info: jest.fn(),
        debug: jest.fn(),
        trace: jest.fn(),
    };
}

export interface TestServices extends LookupServices {
    readonly providers: InMemoryProviderRegistry;
    readonly logger: MockLogger;
}

export function makeServices(
    settings: LookupSettingsInput = {},
    environment: Environment = { name: 'test', module: () => undefined }
): TestServices {
    return {
        settings: loadSettings(settings, {}),
        environment,
        providers: new InMemoryProviderRegistry(),
        functions: FunctionRegistry.withBuiltins(),
        logger: mockLogger(),
    };
}

/** Writes `files` (relative path to content) below a fresh temporary directory. */
export function tempTree(files: Record<string, string>): string {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'tiered-lookup-'));
    for (const [file, content] of Object.entries(files)) {
        const target = path.join(root, file);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, content);
    }
    return root;
}

export function removeTree(root: string): void {
    fs.rmSync(root, { recursive: true, force: true });
}
