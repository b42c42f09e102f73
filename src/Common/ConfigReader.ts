/**
 * Generic config reader for JSON and YAML files. Not tied to the event bus or any specific runtime.
 */
import { readFile } from 'fs/promises';
import { ErrorMessage, IOError, ParseError } from './Errors.js';

/**
 * Loads and parses a config file (JSON or YAML). Does not emit any application events.
 * @param configPath string - Path to config file (e.g. './launcher.config.yaml')
 * @returns Promise<unknown> - Parsed document, validated by the caller
 * @throws IOError if the file cannot be read, ParseError if it cannot be parsed
 * @example
 * const raw = await readConfigFile('./launcher.config.yaml');
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
    let raw: string;

    try {
        raw = await readFile(configPath, 'utf-8');
    } catch (err) {
        throw new IOError(`Cannot read config file ${configPath}: ${ErrorMessage(err)}`, configPath, err);
    }

    try {
        if (configPath.endsWith('.json')) {
            return JSON.parse(raw);
        }
        if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
            // Lazy-load yaml parser only if needed
            const yaml = await import('js-yaml');
            return yaml.load(raw);
        }
    } catch (err) {
        throw new ParseError(`Cannot parse config file ${configPath}: ${ErrorMessage(err)}`, { path: configPath }, err);
    }
    throw new ParseError('Unsupported config file format. Use .json or .yaml', { path: configPath });
}
