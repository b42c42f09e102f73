import { InvalidKeyError } from '../Common/Errors.js';

const SEGMENT = `[A-Za-z_][A-Za-z0-9_]*`;
const KEY_PATTERN = new RegExp(`^${SEGMENT}(\\.${SEGMENT})*$`);

/**
 * Validated settings key. Construction fails fast with InvalidKeyError for anything but a
 * printable ASCII identifier, optionally namespaced with dots (`graphics.size.x`).
 * @example
 * const key = SettingKey.of('update_time');
 */
export class SettingKey {
    public readonly value: string;

    private constructor(value: string) {
        this.value = value;
    }

    /**
     * @param raw string - Key text
     * @throws InvalidKeyError when raw is not an identifier
     */
    public static of(raw: string): SettingKey {
        if (!KEY_PATTERN.test(raw)) {
            throw new InvalidKeyError(raw);
        }
        return new SettingKey(raw);
    }

    /** True for `section.key` forms. */
    public get isNamespaced(): boolean {
        return this.value.includes(`.`);
    }

    /** Dot-separated parts. */
    public get segments(): string[] {
        return this.value.split(`.`);
    }

    public toString(): string {
        return this.value;
    }
}

/** Accepts either form at API boundaries. */
export type SettingKeyLike = SettingKey | string;

export function ToSettingKey(key: SettingKeyLike): SettingKey {
    return key instanceof SettingKey ? key : SettingKey.of(key);
}
