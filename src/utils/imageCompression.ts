import sharp from "sharp";
import { logger } from "./logger";

/** Spotify caps the base64 cover payload at 256 KB. */
export const SPOTIFY_COVER_MAX_BYTES = 256 * 1024;
export const SPOTIFY_COVER_SIZE = 640;

const START_QUALITY = 85;
const MIN_QUALITY = 30;
const QUALITY_STEP = 10;

export function base64Length(byteLength: number): number {
    return Math.ceil(byteLength / 3) * 4;
}

/**
 * Re-encodes any image sharp can read as a square JPEG whose base64 form fits
 * `maxBytes`, stepping quality down. Returns null when even the lowest
 * quality is too large.
 */
export async function toSpotifyCover(
    image: Buffer,
    maxBytes: number = SPOTIFY_COVER_MAX_BYTES
): Promise<Buffer | null> {
    for (
        let quality = START_QUALITY;
        quality >= MIN_QUALITY;
        quality -= QUALITY_STEP
    ) {
        const jpeg = await sharp(image)
            .resize(SPOTIFY_COVER_SIZE, SPOTIFY_COVER_SIZE, { fit: "cover" })
            .flatten({ background: "#ffffff" })
            .jpeg({ quality })
            .toBuffer();

        if (base64Length(jpeg.length) <= maxBytes) {
            logger.debug(
                `Cover encoded: ${image.length} -> ${jpeg.length} bytes (quality ${quality})`
            );
            return jpeg;
        }
    }

    logger.warn(`Cover could not be compressed below ${maxBytes} bytes`);
    return null;
}
