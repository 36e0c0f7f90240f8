// src/types/core.ts — shared data model for the answer pipeline

export type ChatId = string;

export type TurnRole = 'user' | 'assistant';

/** One role-tagged message; immutable once written. */
export interface Turn {
  role: TurnRole;
  content: string;
  /** ISO-8601 */
  timestamp: string;
}

export type PreferredLanguage = 'zh-Hant' | 'zh-Hans' | 'en';

/**
 * Durable per-chat preferences. Merges are additive: a field is only
 * overwritten by a non-empty incoming value.
 */
export interface Profile {
  preferred_language?: PreferredLanguage;
  default_weather_location?: string;
  prefer_links?: boolean;
  conversation_summary?: string;
  /** ISO timestamp of the newest turn already folded into conversation_summary. */
  summarized_through?: string;
  /** How many turns stamped exactly `summarized_through` were folded; they are the earliest ones with that stamp. */
  summarized_ties?: number;
}

export interface SearchResult {
  title: string;
  url: string;
  description: string;
}

/** `text` is empty when the fetch failed or the URL was rejected as non-public. */
export interface FetchedPage {
  title: string;
  url: string;
  text: string;
}

export interface SourceSummary {
  /** 1-based citation index of the source. */
  index: number;
  title: string;
  domain: string;
  text: string;
}

export type PlannerTool = 'web_search' | 'none';

export interface PlanDecision {
  tool: PlannerTool;
  query: string;
}

/** Marker used in place of a date when a source carries none. */
export const NO_DATE_MARKER = '[none]';

export type DateHintValue = string;

export interface SourceDateHints {
  /** citation index → ISO date (YYYY-MM-DD) or NO_DATE_MARKER */
  byIndex: Record<number, DateHintValue>;
  /** Values bullets may start with. */
  allowed: DateHintValue[];
}

export interface FollowUpContext {
  tool: PlannerTool;
  is_news: boolean;
  query: string;
  search_results: SearchResult[];
  fetched_pages: FetchedPage[];
  source_date_hints: SourceDateHints;
  /** Citation indices already used by answers built on these results. */
  cited_indices: number[];
  /** ISO-8601 */
  timestamp: string;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** Closed set of non-fatal degradations a turn can go through. */
export type Degradation =
  | 'PlanningDegraded'
  | 'RetrievalEmpty'
  | 'SummarizationSkipped'
  | 'ValidationExhausted';
