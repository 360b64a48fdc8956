// src/domain/types.ts
// Shared type definitions for the learning coach digest.

export interface DocumentMetadata {
  summary?: string;
  author?: string;
  published?: string;        // publication timestamp as delivered by the source
  tags?: string[];
  source_type?: string;     // "rss", "blog", ...
  [key: string]: unknown;
}

export interface Document {
  id: string;
  title: string;
  content: string;
  source_url: string;
  embedding?: number[];      // produced once at ingestion; excluded from search results
  metadata: DocumentMetadata;
}

/** Raw, already-fetched item handed to ingestion. */
export interface IncomingDocument {
  title: string;
  content: string;
  link: string;
  summary?: string;
  author?: string;
  published?: string;
  tags?: string[];
  source_type?: string;
}

/** A registered feed or blog. Registration only; fetching happens outside this server. */
export interface ContentSource {
  id: string;
  source_url: string;
  source_type: string;       // "rss", "blog", "reddit"
  tags: string[];
  created_at: string;
}

export interface SystemStatus {
  user_progress: LearnerContext | null;
  content_sources_count: number;
  content_sources: ContentSource[];
  total_content_items: number;
  sample_content: Array<{ id: string; title: string; source_url: string; created_at?: string }>;
  has_embeddings: boolean;
}

export interface LearnerContext {
  current_week: number;
  current_topics: string[];
  learning_goals: string;
}

export interface Candidate {
  document: Document;
  similarity?: number;       // [0,1], attached by retrieval
}

export interface ScoredInsight {
  insight: string;
  content_id: string;
  title: string;
  source_url: string;
  relevance_score: number;
  similarity_score: number;
  metadata: DocumentMetadata;
}

export interface StoredInsight {
  id: string;
  insight: string;
  content_id: string;
  title: string;
  source_url: string;
  relevance_score: number;
  week: number;
  created_at: string;        // ISO timestamp
}

export interface InsightQuery {
  contentId?: string;
  date?: string;             // YYYY-MM-DD (UTC day)
  text?: string;
  limit?: number;
}

export interface Digest {
  date: string;
  week: number;
  topics: string[];
  context: LearnerContext;
  summary: string;
  insights: ScoredInsight[];
  total_insights: number;
  persisted_insights: number;
}

export type DigestErrorCode = "NO_PROGRESS" | "MODEL_UNAVAILABLE" | "INVALID_REQUEST" | "INTERNAL";

export type DigestResult =
  | { success: true; digest: Digest }
  | { success: false; error: string; code: DigestErrorCode };

export interface ThresholdPolicy {
  primary: number;
  relaxed: number;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}
