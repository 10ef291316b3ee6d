// src/services/ragSystem.ts
// What: Entry points used by the HTTP layer and scripts: answer a query, ingest documents, report on the catalog.
// How: query() opens a ToolTurn, hands it to the orchestrator, reads the turn's sources once and resets them, then
//      records the exchange in the session. Folder ingestion scans the directory, parses documents with bounded
//      concurrency (p-limit), skips titles already in the catalog and writes each course in one store transaction.

import pLimit from 'p-limit';
import logger from '../logging.js';
import type { Course, CourseAnalytics, IngestSummary, QueryResponse } from '../models/types.js';
import type { ConversationOrchestrator } from './conversation.js';
import type { DocumentProcessor, ParsedCourse } from './documentProcessor.js';
import { scanCourseDocuments } from './scanner.js';
import { ContentSearchTool, CourseOutlineTool } from './searchTools.js';
import type { SessionStore } from './sessionStore.js';
import { ToolRegistry } from './toolRegistry.js';
import type { VectorIndex } from './vectorIndex.js';

export interface RagSystemDeps {
  processor: DocumentProcessor;
  index: VectorIndex;
  registry: ToolRegistry;
  orchestrator: ConversationOrchestrator;
  sessions: SessionStore;
  indexConcurrency?: number;
}

export interface AddedCourse {
  course: Course;
  chunk_count: number;
}

export function createToolRegistry(index: VectorIndex): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(new ContentSearchTool(index));
  registry.register(new CourseOutlineTool(index));
  return registry;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class RagSystem {
  readonly processor: DocumentProcessor;
  readonly index: VectorIndex;
  readonly registry: ToolRegistry;
  readonly orchestrator: ConversationOrchestrator;
  readonly sessions: SessionStore;
  private readonly indexConcurrency: number;

  constructor(deps: RagSystemDeps) {
    this.processor = deps.processor;
    this.index = deps.index;
    this.registry = deps.registry;
    this.orchestrator = deps.orchestrator;
    this.sessions = deps.sessions;
    this.indexConcurrency = Math.max(1, deps.indexConcurrency ?? 2);
  }

  async query(text: string, sessionId?: string | null): Promise<QueryResponse> {
    const prompt = `Answer this question about course materials: ${text}`;
    const history = sessionId ? this.sessions.historyText(sessionId) : null;

    const turn = this.registry.openTurn();
    const answer = await this.orchestrator.generateResponse({
      query: prompt,
      history,
      tools: turn.definitions(),
      dispatcher: turn,
    });

    const sources = turn.collectedSources();
    turn.resetSources();

    if (sessionId) {
      this.sessions.recordExchange(sessionId, text, answer);
    }
    return { answer, sources };
  }

  /** Ingests one document, replacing any course with the same title. Returns null when the document fails. */
  async addCourseDocument(filePath: string): Promise<AddedCourse | null> {
    try {
      const { course, chunks } = await this.processor.processCourseDocument(filePath);
      await this.index.replaceCourse(course, chunks);
      logger.info({ file: filePath, course: course.title, chunks: chunks.length }, 'Course document added');
      return { course, chunk_count: chunks.length };
    } catch (err) {
      logger.error({ err, file: filePath }, 'Failed to add course document');
      return null;
    }
  }

  async addCourseFolder(dir: string, opts: { clearExisting?: boolean } = {}): Promise<IngestSummary> {
    const start = Date.now();
    const summary: IngestSummary = {
      scanned_count: 0,
      added_courses: 0,
      added_chunks: 0,
      skipped_existing: [],
      failed: [],
      duration_ms: 0,
    };

    const files = await scanCourseDocuments(dir);
    if (files === null) {
      logger.warn({ dir }, 'Course folder does not exist');
      summary.duration_ms = Date.now() - start;
      return summary;
    }
    summary.scanned_count = files.length;

    if (opts.clearExisting) {
      logger.info({ dir }, 'Clearing existing course data before ingestion');
      await this.index.clearAll();
    }

    // Titles claimed so far, including ones claimed earlier in this run.
    const known = new Set(await this.index.existingCourseTitles());
    const limit = pLimit(this.indexConcurrency);

    await Promise.all(
      files.map((f) =>
        limit(async () => {
          let parsed: ParsedCourse;
          try {
            parsed = await this.processor.processCourseDocument(f.path);
          } catch (err) {
            logger.error({ err, file: f.path }, 'Skipping unreadable course document');
            summary.failed.push({ file: f.filename, error: errorMessage(err) });
            return;
          }

          const { course, chunks } = parsed;
          if (known.has(course.title)) {
            logger.info({ file: f.path, course: course.title }, 'Course already indexed; skipping');
            summary.skipped_existing.push(course.title);
            return;
          }
          known.add(course.title);

          try {
            await this.index.replaceCourse(course, chunks);
          } catch (err) {
            known.delete(course.title);
            logger.error({ err, file: f.path, course: course.title }, 'Indexing failed');
            summary.failed.push({ file: f.filename, error: errorMessage(err) });
            return;
          }
          summary.added_courses += 1;
          summary.added_chunks += chunks.length;
          logger.info({ file: f.path, course: course.title, chunks: chunks.length }, 'Course indexed');
        }),
      ),
    );

    summary.duration_ms = Date.now() - start;
    return summary;
  }

  async courseAnalytics(): Promise<CourseAnalytics> {
    const [total, titles] = await Promise.all([this.index.courseCount(), this.index.existingCourseTitles()]);
    return { total_courses: total, course_titles: titles };
  }
}
