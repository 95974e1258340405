import { loadConfig, type IngestConfig } from "./config";
import { IngestPipeline } from "./pipeline";

let config: IngestConfig | null = null;
let pipeline: IngestPipeline | null = null;

/** Config read once per server process */
export function getIngestConfig(): IngestConfig {
    if (!config) {
        config = loadConfig();
    }
    return config;
}

/** Pipeline shared by all route handlers (keeps the parsed-document store alive) */
export function getIngestPipeline(): IngestPipeline {
    if (!pipeline) {
        pipeline = IngestPipeline.fromConfig(getIngestConfig());
    }
    return pipeline;
}
