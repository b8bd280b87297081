import type { EnvNamespace } from "../../utils/envParsers";

/**
 * Spotify app credentials for one user, parsed from
 * `SPOTIFY_USER_{USERNAME}_{CLIENT_ID|CLIENT_SECRET|REFRESH_TOKEN}`.
 */
export interface CredentialBundle {
    /** Lowercase form of USERNAME */
    username: string;
    clientId: string;
    clientSecret: string;
    refreshToken: string;
}

export type CredentialField = "CLIENT_ID" | "CLIENT_SECRET" | "REFRESH_TOKEN";

export interface CredentialWarning {
    username: string;
    missingFields: CredentialField[];
    message: string;
}

export interface CredentialDiscovery {
    bundles: CredentialBundle[];
    warnings: CredentialWarning[];
}

const CREDENTIAL_FIELDS: readonly CredentialField[] = [
    "CLIENT_ID",
    "CLIENT_SECRET",
    "REFRESH_TOKEN",
];

// Lazy USERNAME so `_CLIENT_ID` is never swallowed into it
const CREDENTIAL_KEY_PATTERN =
    /^SPOTIFY_USER_([A-Z0-9_]+?)_(CLIENT_ID|CLIENT_SECRET|REFRESH_TOKEN)$/;

function isCredentialField(value: string): value is CredentialField {
    return CREDENTIAL_FIELDS.some((field) => field === value);
}

/**
 * Groups credential keys by user. Users with all three values are returned
 * in ascending username order; the rest become warnings naming the missing
 * fields. Values never appear in warnings.
 */
export function discoverCredentials(namespace: EnvNamespace): CredentialDiscovery {
    const grouped = new Map<string, Partial<Record<CredentialField, string>>>();

    for (const [key, rawValue] of Object.entries(namespace)) {
        const match = CREDENTIAL_KEY_PATTERN.exec(key);
        if (!match || rawValue === undefined) continue;

        const [, rawUsername, field] = match;
        if (!rawUsername || !field || !isCredentialField(field)) continue;

        const username = rawUsername.toLowerCase();
        const fields = grouped.get(username) ?? {};
        fields[field] = rawValue.trim();
        grouped.set(username, fields);
    }

    const bundles: CredentialBundle[] = [];
    const warnings: CredentialWarning[] = [];

    for (const username of Array.from(grouped.keys()).sort()) {
        const fields = grouped.get(username) ?? {};
        const missingFields = CREDENTIAL_FIELDS.filter((field) => !fields[field]);

        const { CLIENT_ID, CLIENT_SECRET, REFRESH_TOKEN } = fields;
        if (missingFields.length === 0 && CLIENT_ID && CLIENT_SECRET && REFRESH_TOKEN) {
            bundles.push({
                username,
                clientId: CLIENT_ID,
                clientSecret: CLIENT_SECRET,
                refreshToken: REFRESH_TOKEN,
            });
            continue;
        }

        warnings.push({
            username,
            missingFields,
            message: `Skipping ${username}: missing ${missingFields
                .map((field) => `SPOTIFY_USER_${username.toUpperCase()}_${field}`)
                .join(", ")}`,
        });
    }

    return { bundles, warnings };
}
