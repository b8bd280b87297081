import * as path from "path";
import { loadConfig } from "../config";
import { ConfigurationError } from "../utils/errors";

describe("loadConfig", () => {
    it("applies defaults around the required OpenAI key", () => {
        const config = loadConfig({ OPENAI_API_KEY: "test-openai-key" });

        expect(config.openai).toEqual({
            apiKey: "test-openai-key",
            baseUrl: "https://api.openai.com/v1",
            textModel: "gpt-5.2",
            imageModel: "chatgpt-image-latest",
            imageSize: "1024x1024",
            imageQuality: "auto",
            recommendationsTemperature: 0.8,
            descriptionTemperature: 1.2,
            timeoutMs: 120000,
        });
        expect(config.spotify).toEqual({
            market: undefined,
            playlistPublic: false,
            timeoutMs: 30000,
        });
        expect(config.discovery).toEqual({
            maxQueries: 30,
            targetTracks: 50,
            minTracks: 10,
            resultsPerQuery: 10,
            windowDays: 7,
            artworkEnabled: true,
        });
        expect(config.userConcurrency).toBe(1);
        expect(path.basename(config.prompts.recommendationsFile)).toBe("recommendations_prompt.md");
    });

    it("reads overrides from the namespace", () => {
        const config = loadConfig({
            OPENAI_API_KEY: "test-openai-key",
            OPENAI_BASE_URL: "http://localhost:8080/v1/",
            OPENAI_IMAGE_SIZE: "512x512",
            SPOTIFY_MARKET: "gb",
            SPOTIFY_PLAYLIST_PUBLIC: "true",
            SKIP_ARTWORK: "true",
            DISCOVERY_MAX_QUERIES: "12",
            USER_CONCURRENCY: "3",
            RECOMMENDATIONS_PROMPT_FILE: "/tmp/custom.md",
        });

        expect(config.openai.baseUrl).toBe("http://localhost:8080/v1");
        expect(config.openai.imageSize).toBe("512x512");
        expect(config.spotify.market).toBe("GB");
        expect(config.spotify.playlistPublic).toBe(true);
        expect(config.discovery.artworkEnabled).toBe(false);
        expect(config.discovery.maxQueries).toBe(12);
        expect(config.userConcurrency).toBe(3);
        expect(config.prompts.recommendationsFile).toBe("/tmp/custom.md");
    });

    it("fails with ConfigurationError when OPENAI_API_KEY is missing", () => {
        expect(() => loadConfig({ OPENAI_API_KEY: "  " })).toThrow(ConfigurationError);
        expect(() => loadConfig({})).toThrow(
            "Invalid configuration: OPENAI_API_KEY is required"
        );
    });

    it("lists every invalid setting", () => {
        let caught: unknown;
        try {
            loadConfig({
                OPENAI_API_KEY: "test-openai-key",
                DISCOVERY_MAX_QUERIES: "80",
                USER_CONCURRENCY: "two",
            });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        expect(caught instanceof ConfigurationError && caught.details).toEqual({
            issues: ["DISCOVERY_MAX_QUERIES must be at most 50", "USER_CONCURRENCY must be a number"],
        });
    });
});
