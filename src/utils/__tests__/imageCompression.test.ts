import sharp from "sharp";
import { base64Length, SPOTIFY_COVER_SIZE, toSpotifyCover } from "../imageCompression";

async function makePng(width: number, height: number): Promise<Buffer> {
    return sharp({
        create: {
            width,
            height,
            channels: 4,
            background: { r: 200, g: 40, b: 90, alpha: 0.5 },
        },
    })
        .png()
        .toBuffer();
}

describe("imageCompression", () => {
    it("computes base64 length", () => {
        expect(base64Length(0)).toBe(0);
        expect(base64Length(1)).toBe(4);
        expect(base64Length(3)).toBe(4);
        expect(base64Length(4)).toBe(8);
    });

    it("re-encodes any image as a square JPEG within the limit", async () => {
        const cover = await toSpotifyCover(await makePng(1024, 768));

        expect(cover).not.toBeNull();
        const metadata = await sharp(cover ?? Buffer.alloc(0)).metadata();
        expect(metadata.format).toBe("jpeg");
        expect(metadata.width).toBe(SPOTIFY_COVER_SIZE);
        expect(metadata.height).toBe(SPOTIFY_COVER_SIZE);
        expect(base64Length(cover?.length ?? 0)).toBeLessThanOrEqual(256 * 1024);
    });

    it("returns null when no quality fits the limit", async () => {
        await expect(toSpotifyCover(await makePng(64, 64), 16)).resolves.toBeNull();
    });

    it("rejects data that is not an image", async () => {
        await expect(toSpotifyCover(Buffer.from("not an image"))).rejects.toThrow();
    });
});
