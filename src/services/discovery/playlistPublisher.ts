import { createLogger } from "../../utils/logger";
import { AppError, ErrorCode, PublishError, errorMessage } from "../../utils/errors";
import type { UserSession, PlaylistWriteResult } from "../spotify";

const log = createLogger("weekly-discovery.publisher");

export const PLAYLIST_NAME_PREFIX = "Weekly Discovery";

export interface PublishedPlaylist extends PlaylistWriteResult {
    name: string;
    trackCount: number;
}

export function playlistNameForWeek(targetWeek: string): string {
    return `${PLAYLIST_NAME_PREFIX} — ${targetWeek}`;
}

/**
 * Writes the week's playlist. The name is the identity: re-running within the
 * same target week updates the playlist instead of adding a second one.
 */
export async function publishPlaylist(
    session: UserSession,
    targetWeek: string,
    trackIds: readonly string[],
    description: string,
    artwork: Buffer | null
): Promise<PublishedPlaylist> {
    const name = playlistNameForWeek(targetWeek);

    try {
        const result = await session.createOrUpdatePlaylist({
            name,
            trackIds: [...trackIds],
            description,
            artwork,
        });
        if (artwork && !result.artworkUploaded) {
            log.warn(`"${name}" for ${session.username} published without its cover`);
        }
        return { ...result, name, trackCount: trackIds.length };
    } catch (error) {
        if (
            error instanceof AppError &&
            (error.code === ErrorCode.PUBLISH ||
                error.code === ErrorCode.RATE_LIMIT ||
                error.code === ErrorCode.CANCELLED)
        ) {
            throw error;
        }
        throw new PublishError(`Could not write "${name}": ${errorMessage(error)}`, {
            playlist: name,
        });
    }
}
