export type EnvNamespace = Readonly<Record<string, string | undefined>>;

/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty.
 * Returns NaN for garbage so the config schema can report it.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value.trim()
            : String(fallback);
    return /^-?\d+$/.test(source) ? Number.parseInt(source, 10) : Number.NaN;
}

export function parseEnvFloat(value: string | undefined, fallback: number): number {
    if (typeof value !== "string" || value.trim().length === 0) {
        return fallback;
    }
    return Number(value.trim());
}

export function isEnvFlagEnabled(value: string | undefined): boolean {
    return value?.trim().toLowerCase() === "true";
}

export function readEnvString(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}
