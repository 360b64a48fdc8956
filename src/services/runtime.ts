// src/services/runtime.ts
// Wires the collaborators together once per process. Nothing below this is a hidden singleton.

import { DigestAssembler, type DigestOptions } from "./digest.js";
import { type Embedder, loadEmbedder } from "./embedder.js";
import { type GenerationService, createGenerationService } from "./generation.js";
import { type InsightStore, OpenSearchInsightStore } from "./insight-store.js";
import { InsightGenerator } from "./insights.js";
import { debug } from "./log.js";
import { type IndexNames, indexNamesFromConfig } from "./os-bootstrap.js";
import { type IndexOps, openSearchOps } from "./os-client.js";
import { OpenSearchProgressStore, type ProgressStore } from "./progress-store.js";
import { ContentRetriever, thresholdPolicyFromConfig } from "./retriever.js";
import { RelevanceScorer } from "./scorer.js";
import { OpenSearchSourceStore, type SourceStore } from "./source-store.js";
import { SystemStatusReporter } from "./status.js";
import { OpenSearchVectorStore, type VectorStore } from "./vector-store.js";

const log = debug("coach:runtime");

export interface Runtime {
  embedder: Embedder;
  generation: GenerationService;
  vectorStore: VectorStore;
  progressStore: ProgressStore;
  insightStore: InsightStore;
  sourceStore: SourceStore;
  retriever: ContentRetriever;
  scorer: RelevanceScorer;
  insights: InsightGenerator;
  digest: DigestAssembler;
  status: SystemStatusReporter;
}

export interface RuntimeParts {
  embedder: Embedder;
  generation: GenerationService;
  ops: IndexOps;
  indices?: IndexNames;
  digestOptions?: DigestOptions;
  now?: () => Date;
}

export function buildRuntime(parts: RuntimeParts): Runtime {
  const indices = parts.indices ?? indexNamesFromConfig();
  const vectorStore = new OpenSearchVectorStore(parts.ops, indices.content);
  const progressStore = new OpenSearchProgressStore(parts.ops, indices.progress);
  const insightStore = new OpenSearchInsightStore(parts.ops, indices.insights);
  const sourceStore = new OpenSearchSourceStore(parts.ops, indices.sources);
  const retriever = new ContentRetriever(vectorStore, parts.embedder, thresholdPolicyFromConfig());
  const scorer = new RelevanceScorer(parts.generation, { now: parts.now });
  const insights = new InsightGenerator(parts.generation);
  const digest = new DigestAssembler(
    { retriever, insights, scorer, generation: parts.generation, insightStore, progressStore },
    { now: parts.now, ...parts.digestOptions }
  );
  const status = new SystemStatusReporter({ ops: parts.ops, indices, progressStore, sourceStore });
  return {
    embedder: parts.embedder,
    generation: parts.generation,
    vectorStore,
    progressStore,
    insightStore,
    sourceStore,
    retriever,
    scorer,
    insights,
    digest,
    status
  };
}

/** Load the embedding model, build the generation client and connect to OpenSearch. */
export async function createRuntime(): Promise<Runtime> {
  const embedder = await loadEmbedder();
  const generation = createGenerationService();
  log("runtime.ready", { embedder: embedder.model, dim: embedder.dim });
  return buildRuntime({ embedder, generation, ops: openSearchOps() });
}
