export {
    discoverCredentials,
    CredentialBundle,
    CredentialDiscovery,
    CredentialField,
    CredentialWarning,
} from "./credentialRegistry";
export { DiscoveryEngine, DiscoveryEngineOptions, filterQueries, queryMix } from "./discoveryEngine";
export { NarrativeGenerator, NarrativeGeneratorOptions, NarrativeTemplates } from "./narrativeGenerator";
export { publishPlaylist, playlistNameForWeek, PublishedPlaylist } from "./playlistPublisher";
export { generateStructured, MAX_GENERATION_ATTEMPTS } from "./structuredOutput";
