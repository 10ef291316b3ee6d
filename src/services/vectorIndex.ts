// src/services/vectorIndex.ts
// What: Course-aware index over the catalog and content collections.
// How: Catalog entries embed the course title and carry the lesson list as JSON; content entries embed the
//      prefixed chunk text. Course names from users are resolved by a size-1 nearest-neighbour query against the
//      catalog (no similarity threshold: the closest title always wins), then content is searched with exact
//      metadata filters. search() never throws; failures come back as an error-marked SearchResults.

import { z } from 'zod';
import type { RagSettings } from '../config/settings.js';
import logger from '../logging.js';
import type {
  CatalogMetadata,
  ContentMetadata,
  Course,
  CourseChunk,
  CourseMatch,
  Lesson,
  SearchParams,
  SearchResults,
} from '../models/types.js';
import { clampSimilarity } from '../util/sql.js';
import type { EmbeddingFunction } from './embeddings.js';
import type { VectorRecord, VectorStore } from './vectorStore.js';

const lessonsJsonSchema = z.array(
  z.object({
    lesson_number: z.number().int().nonnegative(),
    lesson_title: z.string(),
    lesson_link: z.string().nullable(),
  }),
);

export function contentId(chunk: Pick<CourseChunk, 'course_title' | 'chunk_index'>): string {
  return `${chunk.course_title}_${chunk.chunk_index}`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function catalogMetadata(course: Course): CatalogMetadata {
  const lessons = course.lessons.map((l) => ({
    lesson_number: l.lesson_number,
    lesson_title: l.title,
    lesson_link: l.lesson_link,
  }));
  return {
    title: course.title,
    instructor: course.instructor,
    course_link: course.course_link,
    lessons_json: JSON.stringify(lessons),
    lesson_count: lessons.length,
  };
}

function parseLessons(metadata: CatalogMetadata): Lesson[] {
  return lessonsJsonSchema
    .parse(JSON.parse(metadata.lessons_json))
    .map((l) => ({ lesson_number: l.lesson_number, title: l.lesson_title, lesson_link: l.lesson_link }))
    .sort((a, b) => a.lesson_number - b.lesson_number);
}

export class VectorIndex {
  private readonly maxResults: number;

  constructor(
    private readonly store: VectorStore,
    private readonly embed: EmbeddingFunction,
    settings: Pick<RagSettings, 'maxResults'>,
  ) {
    this.maxResults = settings.maxResults;
  }

  async upsertCourse(course: Course): Promise<void> {
    const record = await this.catalogRecord(course);
    await this.store.catalog.upsert([record]);
  }

  async upsertChunks(chunks: CourseChunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const records = await this.contentRecords(chunks);
    await this.store.transaction((tx) => tx.content.upsert(records));
  }

  /**
   * Replaces a course's catalog entry and every chunk it had before. Embeddings are computed first so a failing
   * embedding call leaves the stored course untouched.
   */
  async replaceCourse(course: Course, chunks: CourseChunk[]): Promise<void> {
    const mismatched = chunks.find((c) => c.course_title !== course.title);
    if (mismatched) {
      throw new Error(`Chunk ${mismatched.chunk_index} belongs to "${mismatched.course_title}", not "${course.title}"`);
    }
    const catalog = await this.catalogRecord(course);
    const content = chunks.length > 0 ? await this.contentRecords(chunks) : [];

    await this.store.transaction(async (tx) => {
      const removed = await tx.content.deleteWhere({ course_title: course.title });
      await tx.catalog.upsert([catalog]);
      await tx.content.upsert(content);
      logger.debug({ course: course.title, removed, added: content.length }, 'Course replaced');
    });
  }

  async matchCourse(partialName: string): Promise<CourseMatch | null> {
    const [embedding] = await this.embed([partialName]);
    const [best] = await this.store.catalog.query({ embedding, limit: 1 });
    if (!best) return null;
    return { title: best.metadata.title, distance: best.distance, similarity: clampSimilarity(best.distance) };
  }

  async resolveCourseTitle(partialName: string): Promise<string | null> {
    const match = await this.matchCourse(partialName);
    return match?.title ?? null;
  }

  async search(params: SearchParams): Promise<SearchResults> {
    const { query, course_name, lesson_number } = params;
    try {
      let courseTitle: string | null = null;
      if (course_name) {
        courseTitle = await this.resolveCourseTitle(course_name);
        if (!courseTitle) {
          return { ok: false, error: `No course found matching '${course_name}'` };
        }
      }

      const where: Partial<ContentMetadata> = {};
      if (courseTitle) where.course_title = courseTitle;
      if (lesson_number !== undefined && lesson_number !== null) where.lesson_number = lesson_number;

      const [embedding] = await this.embed([query]);
      const matches = await this.store.content.query({
        embedding,
        limit: params.limit ?? this.maxResults,
        where,
      });
      return {
        ok: true,
        hits: matches.map((m) => ({ document: m.document, metadata: m.metadata, distance: m.distance })),
      };
    } catch (err) {
      logger.warn({ err, query }, 'Content search failed');
      return { ok: false, error: `Search error: ${errorMessage(err)}` };
    }
  }

  async lessonLinks(courseTitle: string): Promise<Map<number, string>> {
    const links = new Map<number, string>();
    const [entry] = await this.store.catalog.get([courseTitle]);
    if (!entry) return links;
    for (const lesson of parseLessons(entry.metadata)) {
      if (lesson.lesson_link) links.set(lesson.lesson_number, lesson.lesson_link);
    }
    return links;
  }

  async courseOutline(courseTitle: string): Promise<Course | null> {
    const [entry] = await this.store.catalog.get([courseTitle]);
    if (!entry) return null;
    return {
      title: entry.metadata.title,
      course_link: entry.metadata.course_link,
      instructor: entry.metadata.instructor,
      lessons: parseLessons(entry.metadata),
    };
  }

  async clearAll(): Promise<void> {
    await this.store.transaction(async (tx) => {
      await tx.catalog.clear();
      await tx.content.clear();
    });
  }

  async existingCourseTitles(): Promise<string[]> {
    return this.store.catalog.ids();
  }

  async courseCount(): Promise<number> {
    return this.store.catalog.count();
  }

  private async catalogRecord(course: Course): Promise<VectorRecord<CatalogMetadata>> {
    const [embedding] = await this.embed([course.title]);
    return { id: course.title, document: course.title, metadata: catalogMetadata(course), embedding };
  }

  private async contentRecords(chunks: CourseChunk[]): Promise<VectorRecord<ContentMetadata>[]> {
    const embeddings = await this.embed(chunks.map((c) => c.content));
    if (embeddings.length !== chunks.length) {
      throw new Error(`Embedding count mismatch; expected ${chunks.length}, got ${embeddings.length}`);
    }
    return chunks.map((c, i) => ({
      id: contentId(c),
      document: c.content,
      metadata: { course_title: c.course_title, lesson_number: c.lesson_number, chunk_index: c.chunk_index },
      embedding: embeddings[i],
    }));
  }
}
