// src/services/searchTools.ts
// What: The two tools the model can call: content search and course outline lookup.
// How: Each tool validates its arguments with zod and returns a ToolResult (text for the model plus the sources it
//      cites). "Nothing found" and store failures are reported as text so the model can react to them; only
//      unexpected bugs inside a tool are thrown.

import { z } from 'zod';
import logger from '../logging.js';
import type { SearchHit, ToolDefinition, ToolResult, ToolSource } from '../models/types.js';
import type { VectorIndex } from './vectorIndex.js';

export interface Tool {
  definition(): ToolDefinition;
  execute(args: Record<string, unknown>): Promise<ToolResult>;
}

const contentSearchArgs = z.object({
  query: z.string(),
  course_name: z.string().nullish(),
  lesson_number: z.number().int().nullish(),
});

const courseOutlineArgs = z.object({
  course_name: z.string(),
});

function textOnly(content: string): ToolResult {
  return { content, sources: [] };
}

function invalidArgs(tool: string, error: z.ZodError): ToolResult {
  const issues = error.issues.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
  return textOnly(`Invalid arguments for '${tool}': ${issues}`);
}

function hitLabel(hit: SearchHit): string {
  const { course_title, lesson_number } = hit.metadata;
  return lesson_number === null ? course_title : `${course_title} - Lesson ${lesson_number}`;
}

export class ContentSearchTool implements Tool {
  static readonly NAME = 'search_course_content';

  constructor(private readonly index: VectorIndex) {}

  definition(): ToolDefinition {
    return {
      name: ContentSearchTool.NAME,
      description: 'Search course materials with smart course name matching and lesson filtering',
      input_schema: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'What to search for in the course content' },
          course_name: { type: 'string', description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')" },
          lesson_number: { type: 'integer', description: 'Specific lesson number to search within (e.g. 1, 2, 3)' },
        },
        required: ['query'],
      },
    };
  }

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = contentSearchArgs.safeParse(args);
    if (!parsed.success) return invalidArgs(ContentSearchTool.NAME, parsed.error);
    const { query, course_name, lesson_number } = parsed.data;

    const results = await this.index.search({ query, course_name, lesson_number });
    if (!results.ok) return textOnly(results.error);

    if (results.hits.length === 0) {
      let filters = '';
      if (course_name) filters += ` in course '${course_name}'`;
      if (lesson_number !== undefined && lesson_number !== null) filters += ` in lesson ${lesson_number}`;
      return textOnly(`No relevant content found${filters}.`);
    }

    const links = await this.linksFor(results.hits);
    const blocks: string[] = [];
    const sources: ToolSource[] = [];
    for (const hit of results.hits) {
      const label = hitLabel(hit);
      const lesson = hit.metadata.lesson_number;
      const link = lesson === null ? undefined : links.get(hit.metadata.course_title)?.get(lesson);
      blocks.push(`[${label}]\n${hit.document}`);
      sources.push({ text: label, link: link ?? null });
    }
    return { content: blocks.join('\n\n'), sources };
  }

  // One catalog read per course; a failed read only costs that course its links.
  private async linksFor(hits: SearchHit[]): Promise<Map<string, Map<number, string>>> {
    const out = new Map<string, Map<number, string>>();
    for (const title of new Set(hits.map((h) => h.metadata.course_title))) {
      try {
        out.set(title, await this.index.lessonLinks(title));
      } catch (err) {
        logger.warn({ err, course: title }, 'Lesson link lookup failed; returning sources without links');
      }
    }
    return out;
  }
}

export class CourseOutlineTool implements Tool {
  static readonly NAME = 'get_course_outline';

  constructor(private readonly index: VectorIndex) {}

  definition(): ToolDefinition {
    return {
      name: CourseOutlineTool.NAME,
      description:
        'Get the complete outline of a course: title, course link, instructor and every lesson with its number and title',
      input_schema: {
        type: 'object',
        properties: {
          course_name: { type: 'string', description: 'Course title (partial matches work)' },
        },
        required: ['course_name'],
      },
    };
  }

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = courseOutlineArgs.safeParse(args);
    if (!parsed.success) return invalidArgs(CourseOutlineTool.NAME, parsed.error);
    const { course_name } = parsed.data;

    try {
      const title = await this.index.resolveCourseTitle(course_name);
      if (!title) return textOnly(`No course found matching '${course_name}'`);

      const course = await this.index.courseOutline(title);
      if (!course) return textOnly(`Course metadata not found for '${title}'`);

      const lines = [`**${course.title}**`];
      if (course.instructor) lines.push(`**Instructor:** ${course.instructor}`);
      if (course.course_link) lines.push(`**Course Link:** ${course.course_link}`);
      lines.push('', '**Lessons:**');
      if (course.lessons.length === 0) lines.push('No lessons listed.');
      for (const lesson of course.lessons) {
        lines.push(`Lesson ${lesson.lesson_number}: ${lesson.title}`);
      }
      return textOnly(lines.join('\n'));
    } catch (err) {
      logger.warn({ err, course_name }, 'Course outline lookup failed');
      return textOnly(`Error retrieving course outline: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
