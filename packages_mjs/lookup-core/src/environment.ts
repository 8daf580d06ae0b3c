/**
 * The environment and module metadata a lookup session runs against.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { CONFIG_FILE_NAME } from './hiera-config/constants';

export const ModuleMetadataSchema = z.object({
    name: z.string().optional(),
    version: z.string().optional(),
    data_provider: z.string().nullable().optional(),
}).passthrough();

export type ModuleMetadata = z.infer<typeof ModuleMetadataSchema>;

export interface ModuleInfo {
    readonly name: string;
    readonly path: string;
    readonly metadata?: ModuleMetadata;
    readonly metadataFile?: string;
    hasHieraConf(): boolean;
}

export interface EnvironmentConfiguration {
    /** Directory holding the environment's hiera.yaml. */
    readonly pathToEnv?: string;
    /** Legacy provider setting: 'none', 'hiera', 'function' or a registered name. */
    readonly environmentDataProvider?: string;
}

export interface Environment {
    readonly name: string;
    readonly configuration?: EnvironmentConfiguration;
    module(name: string): ModuleInfo | undefined;
}

const MODULE_NAME = /^[a-z][a-z0-9_]*$/;

class DirectoryModule implements ModuleInfo {
    readonly metadata?: ModuleMetadata;
    readonly metadataFile?: string;

    constructor(readonly name: string, readonly path: string) {
        const metadataFile = `${path}/metadata.json`;
        if (fs.existsSync(metadataFile)) {
            this.metadataFile = metadataFile;
            this.metadata = DirectoryModule.readMetadata(metadataFile);
        }
    }

    hasHieraConf(): boolean {
        return fs.existsSync(`${this.path}/${CONFIG_FILE_NAME}`);
    }

    private static readMetadata(file: string): ModuleMetadata {
        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
        } catch (error) {
            throw new ConfigurationError(`Unable to parse metadata: ${error instanceof Error ? error.message : String(error)}`, file);
        }
        const result = ModuleMetadataSchema.safeParse(raw);
        if (!result.success) {
            const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
            throw new ConfigurationError(`Invalid metadata: ${issues}`, file);
        }
        return result.data;
    }
}

export interface DirectoryEnvironmentOptions {
    name: string;
    /** Environment directory. Its hiera.yaml configures the environment tier. */
    path: string;
    /** Directories searched for modules, in order. Defaults to `<path>/modules`. */
    modulePath?: string[];
    environmentDataProvider?: string;
}

/**
 * An environment laid out on disk, with modules found by directory name.
 */
export class DirectoryEnvironment implements Environment {
    readonly name: string;
    readonly configuration: EnvironmentConfiguration;
    private readonly modulePath: string[];
    private readonly modules = new Map<string, ModuleInfo | undefined>();

    constructor(options: DirectoryEnvironmentOptions) {
        this.name = options.name;
        this.configuration = {
            pathToEnv: path.resolve(options.path),
            environmentDataProvider: options.environmentDataProvider,
        };
        this.modulePath = (options.modulePath ?? [path.join(options.path, 'modules')]).map(dir => path.resolve(dir));
    }

    module(name: string): ModuleInfo | undefined {
        if (!this.modules.has(name)) {
            this.modules.set(name, this.findModule(name));
        }
        return this.modules.get(name);
    }

    private findModule(name: string): ModuleInfo | undefined {
        if (!MODULE_NAME.test(name)) {
            return undefined;
        }
        for (const dir of this.modulePath) {
            const candidate = path.join(dir, name);
            if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
                return new DirectoryModule(name, candidate);
            }
        }
        return undefined;
    }
}
