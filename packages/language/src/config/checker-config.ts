import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Settings that influence a checking session.
 *
 * A project can override any of these through a `perm.json` file in its root
 * directory; missing fields fall back to {@link DEFAULT_CHECKER_CONFIG}.
 */
export type IntegerTypeName = 'u8' | 'u16' | 'u32' | 'u64' | 'usize' | 'i8' | 'i16' | 'i32' | 'i64' | 'isize';

export interface CheckerConfig {
    /** Print every step of the checker through the logger */
    readonly trace: boolean;
    /** Primitive an integer literal takes when nothing else constrains it */
    readonly defaultIntegerType: IntegerTypeName;
    /** URI attached to diagnostics converted to LSP form */
    readonly documentUri: string;
    /** Upper bound on the number of times the runtime may settle a stuck inference variable */
    readonly maxSettleRounds: number;
}

export const DEFAULT_CHECKER_CONFIG: CheckerConfig = {
    trace: false,
    defaultIntegerType: 'i32',
    documentUri: 'memory://main.perm',
    maxSettleRounds: 10_000,
};

export const CONFIG_FILE_NAME = 'perm.json';

const INTEGER_TYPES: readonly IntegerTypeName[] = ['u8', 'u16', 'u32', 'u64', 'usize', 'i8', 'i16', 'i32', 'i64', 'isize'];

function isIntegerTypeName(name: string): name is IntegerTypeName {
    return INTEGER_TYPES.some(candidate => candidate === name);
}

export class CheckerConfigError extends Error {
    constructor(readonly file: string, message: string) {
        super(`${file}: ${message}`);
        this.name = 'CheckerConfigError';
    }
}

/**
 * Validates a parsed configuration object and merges it over the defaults.
 * Unknown fields are ignored.
 */
export function parseCheckerConfig(parsed: unknown, file = CONFIG_FILE_NAME): CheckerConfig {
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new CheckerConfigError(file, 'expected a JSON object');
    }
    const config: { -readonly [K in keyof CheckerConfig]: CheckerConfig[K] } = { ...DEFAULT_CHECKER_CONFIG };
    const fields = new Map<string, unknown>(Object.entries(parsed));

    const trace = fields.get('trace');
    if (trace !== undefined) {
        if (typeof trace !== 'boolean') {
            throw new CheckerConfigError(file, '`trace` must be a boolean');
        }
        config.trace = trace;
    }

    const defaultIntegerType = fields.get('defaultIntegerType');
    if (defaultIntegerType !== undefined) {
        if (typeof defaultIntegerType !== 'string' || !isIntegerTypeName(defaultIntegerType)) {
            throw new CheckerConfigError(file, `\`defaultIntegerType\` must be one of ${INTEGER_TYPES.join(', ')}`);
        }
        config.defaultIntegerType = defaultIntegerType;
    }

    const documentUri = fields.get('documentUri');
    if (documentUri !== undefined) {
        if (typeof documentUri !== 'string') {
            throw new CheckerConfigError(file, '`documentUri` must be a string');
        }
        config.documentUri = documentUri;
    }

    const maxSettleRounds = fields.get('maxSettleRounds');
    if (maxSettleRounds !== undefined) {
        if (typeof maxSettleRounds !== 'number' || !Number.isInteger(maxSettleRounds) || maxSettleRounds <= 0) {
            throw new CheckerConfigError(file, '`maxSettleRounds` must be a positive integer');
        }
        config.maxSettleRounds = maxSettleRounds;
    }

    return config;
}

/**
 * Reads `perm.json` from the given directory.
 * Returns the defaults when the directory has no configuration file.
 */
export async function loadCheckerConfig(directory: string): Promise<CheckerConfig> {
    const file = path.join(directory, CONFIG_FILE_NAME);
    let content: string;
    try {
        content = await fs.readFile(file, 'utf-8');
    } catch (error) {
        if (isMissingFile(error)) {
            return DEFAULT_CHECKER_CONFIG;
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new CheckerConfigError(file, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
    }
    return parseCheckerConfig(parsed, file);
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
