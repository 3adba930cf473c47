import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ALL_OPTIONS, DEFAULT_OPTIONS, SelectorOptions } from './selector/options.js';
import type { RandomSource } from './util/rng.js';

/**
 * Upper bound for `decimalPlaces`. Scaled totals must stay within Number.MAX_SAFE_INTEGER, which at
 * 9 places caps the summed weight at roughly 9e6; `build()` rejects anything larger.
 */
export const MAX_DECIMAL_PLACES = 9;

/**
 * Console-shaped sink for selector diagnostics. `console` itself satisfies it.
 */
export interface SelectorLogger {
    debug(message: string): void;
    warn(message: string): void;
}

function hasMethods(value: unknown, ...methods: string[]): boolean {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return methods.every((method) => method in value && typeof Reflect.get(value, method) === 'function');
}

const RandomSourceSchema = z.custom<RandomSource>((value) => hasMethods(value, 'random', 'int'), {
    message: 'rng must provide random() and int()',
});

const LoggerSchema = z.custom<SelectorLogger>((value) => hasMethods(value, 'debug', 'warn'), {
    message: 'logger must provide debug() and warn()',
});

export const SelectorSettingsSchema = z.object({
    options: z.number().int().min(SelectorOptions.None).max(ALL_OPTIONS).default(DEFAULT_OPTIONS),
    decimalPlaces: z.number().int().min(0).max(MAX_DECIMAL_PLACES).default(2),
    seed: z.union([z.number(), z.string()]).optional(),
    rng: RandomSourceSchema.optional(),
    logger: LoggerSchema.optional(),
});

export type SelectorSettings = z.infer<typeof SelectorSettingsSchema>;
export type SelectorSettingsInput = z.input<typeof SelectorSettingsSchema>;

export const ENV_PREFIX = 'WEIGHTED_SELECTOR_';

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
    const raw = env[`${ENV_PREFIX}${name}`];
    if (raw === undefined || raw.trim() === '') {
        return undefined;
    }
    switch (raw.trim().toLowerCase()) {
        case 'true':
        case '1':
            return true;
        case 'false':
        case '0':
            return false;
        default:
            throw new Error(`Invalid boolean in ${ENV_PREFIX}${name}: '${raw}'`);
    }
}

function readInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[`${ENV_PREFIX}${name}`];
    if (raw === undefined || raw.trim() === '') {
        return undefined;
    }
    if (!/^\d+$/.test(raw.trim())) {
        throw new Error(`Invalid integer in ${ENV_PREFIX}${name}: '${raw}'`);
    }
    return parseInt(raw, 10);
}

export interface LoadSettingsOptions {
    /** Dotenv file to read. Defaults to `.env` in the working directory when reading `process.env`. */
    envFile?: string;
}

/**
 * Parses a dotenv file without touching `process.env`. Missing files yield no values.
 */
function readEnvFile(envFile: string): Record<string, string> {
    const absolutePath = resolve(envFile);
    if (!existsSync(absolutePath)) {
        return {};
    }
    return dotenv.parse(readFileSync(absolutePath, 'utf-8'));
}

/**
 * Reads selector settings from the environment, layered over a `.env` file.
 * Variables already set in `source` win over the file; unset ones fall back to the schema defaults.
 */
export function loadSelectorSettings(
    source: NodeJS.ProcessEnv = process.env,
    { envFile = source === process.env ? '.env' : undefined }: LoadSettingsOptions = {}
): SelectorSettings {
    const env: NodeJS.ProcessEnv = envFile ? { ...readEnvFile(envFile), ...source } : source;

    const allowDuplicates = readBoolean(env, 'ALLOW_DUPLICATES');
    const ignoreZeroWeight = readBoolean(env, 'IGNORE_ZERO_WEIGHT');

    let options: number | undefined;
    if (allowDuplicates !== undefined || ignoreZeroWeight !== undefined) {
        options = DEFAULT_OPTIONS;
        if (allowDuplicates !== undefined) {
            options = allowDuplicates
                ? options | SelectorOptions.AllowDuplicates
                : options & ~SelectorOptions.AllowDuplicates;
        }
        if (ignoreZeroWeight !== undefined) {
            options = ignoreZeroWeight
                ? options | SelectorOptions.IgnoreZeroWeight
                : options & ~SelectorOptions.IgnoreZeroWeight;
        }
    }

    const seed = env[`${ENV_PREFIX}SEED`];

    return SelectorSettingsSchema.parse({
        options,
        decimalPlaces: readInteger(env, 'DECIMAL_PLACES'),
        seed: seed === undefined || seed === '' ? undefined : seed,
    });
}
