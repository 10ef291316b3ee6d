// src/models/types.ts
// What: Shared TypeScript types for courses, chunks, search results and tool I/O.
// How: Field names mirror the metadata stored in the vector collections (snake_case), so records round-trip
//      without renaming.

export interface Lesson {
  lesson_number: number;
  title: string;
  lesson_link: string | null;
}

export interface Course {
  title: string; // unique key across the corpus
  course_link: string | null;
  instructor: string | null;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string; // prefixed with course/lesson context
  course_title: string;
  lesson_number: number | null;
  chunk_index: number; // 0..N-1 per course, document order
}

// Metadata stored alongside each catalog entry (one per course). Type aliases, not interfaces, so they satisfy
// the store's flat metadata index signature.
export type CatalogMetadata = {
  title: string;
  instructor: string | null;
  course_link: string | null;
  lessons_json: string;
  lesson_count: number;
};

// Metadata stored alongside each content entry (one per chunk).
export type ContentMetadata = {
  course_title: string;
  lesson_number: number | null;
  chunk_index: number;
};

export interface SearchHit {
  document: string;
  metadata: ContentMetadata;
  distance: number; // cosine distance, ascending = closer
}

export type SearchResults = { ok: true; hits: SearchHit[] } | { ok: false; error: string };

export interface CourseMatch {
  title: string;
  distance: number;
  similarity: number; // [0,1]
}

export interface SearchParams {
  query: string;
  course_name?: string | null;
  lesson_number?: number | null;
  limit?: number;
}

export interface ToolSource {
  text: string;
  link: string | null;
}

export interface ToolResult {
  content: string;
  sources: ToolSource[];
}

export interface ToolInputProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, ToolInputProperty>;
    required: string[];
  };
}

export interface QueryResponse {
  answer: string;
  sources: ToolSource[];
}

export interface CourseAnalytics {
  total_courses: number;
  course_titles: string[];
}

export interface IngestSummary {
  scanned_count: number;
  added_courses: number;
  added_chunks: number;
  skipped_existing: string[];
  failed: { file: string; error: string }[];
  duration_ms: number;
}
