// src/services/documentProcessor.ts
// What: Parses course documents into a Course plus ordered, overlapping CourseChunks.
// How: Reads the "Course Title/Link/Instructor" header, splits the rest on "Lesson N: Title" markers, then cuts
//      each lesson body into windows of whole sentences no longer than the configured size. Only a sentence longer
//      than the window is hard-cut. Consecutive windows share the trailing sentences of the earlier one that fit in
//      `chunkOverlap` characters. Chunks are numbered 0..N-1 across the whole document and carry a
//      "Course X Lesson N content:" prefix so they read correctly when retrieved on their own.

import fs from 'node:fs/promises';
import type { RagSettings } from '../config/settings.js';
import { ParseError } from '../errors.js';
import type { Course, CourseChunk, Lesson } from '../models/types.js';

const TITLE_RE = /^Course Title:\s*(.*)$/i;
const LINK_RE = /^Course Link:\s*(.*)$/i;
const INSTRUCTOR_RE = /^Course Instructor:\s*(.*)$/i;
const LESSON_RE = /^Lesson\s+(\d+)\s*:\s*(.*)$/i;
const LESSON_LINK_RE = /^Lesson Link:\s*(.*)$/i;

export interface TextWindow {
  start: number; // offset into the normalized text
  end: number; // exclusive
  text: string;
}

export interface ParsedCourse {
  course: Course;
  chunks: CourseChunk[];
}

interface Section {
  lesson: Lesson | null;
  body: string[];
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

interface Span {
  start: number;
  end: number; // exclusive
}

// Sentences of already-normalized text: each ends at a run of terminators followed by a space or the end.
function sentenceSpans(text: string): Span[] {
  const spans: Span[] = [];
  const re = /[.!?]+(?=\s|$)/g;
  let start = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    const end = m.index + m[0].length;
    spans.push({ start, end });
    start = end + 1;
  }
  if (start < text.length) spans.push({ start, end: text.length });
  return spans;
}

// Only a sentence longer than the window is split, into consecutive pieces of at most chunkSize characters.
function windowUnits(text: string, chunkSize: number): Span[] {
  const units: Span[] = [];
  for (const s of sentenceSpans(text)) {
    for (let at = s.start; at < s.end; at += chunkSize) {
      units.push({ start: at, end: Math.min(at + chunkSize, s.end) });
    }
  }
  return units;
}

export function splitIntoWindows(text: string, chunkSize: number, chunkOverlap: number): TextWindow[] {
  const body = normalizeWhitespace(text);
  if (body.length === 0) return [];

  const units = windowUnits(body, chunkSize);
  const windows: TextWindow[] = [];
  let first = 0;

  while (first < units.length) {
    const start = units[first].start;
    let next = first + 1;
    while (next < units.length && units[next].end - start <= chunkSize) next++;

    const end = units[next - 1].end;
    windows.push({ start, end, text: body.slice(start, end) });
    if (next >= units.length) break;

    // Carry over the trailing whole sentences that fit in chunkOverlap, never the window's first one, and only
    // as many as still leave room for the next sentence.
    let carry = next;
    while (carry - 1 > first && end - units[carry - 1].start <= chunkOverlap) carry--;
    while (carry < next && units[next].end - units[carry].start > chunkSize) carry++;
    first = carry;
  }
  return windows;
}

function lessonPrefix(courseTitle: string, lessonNumber: number | null): string {
  return lessonNumber === null
    ? `Course ${courseTitle} content: `
    : `Course ${courseTitle} Lesson ${lessonNumber} content: `;
}

export class DocumentProcessor {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  constructor(settings: Pick<RagSettings, 'chunkSize' | 'chunkOverlap'>) {
    this.chunkSize = settings.chunkSize;
    this.chunkOverlap = settings.chunkOverlap;
  }

  async processCourseDocument(filePath: string): Promise<ParsedCourse> {
    const text = await fs.readFile(filePath, 'utf8');
    try {
      return this.parseCourseDocument(text);
    } catch (err) {
      if (err instanceof ParseError) {
        throw new ParseError(`${filePath}: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }

  parseCourseDocument(text: string): ParsedCourse {
    const lines = text.split(/\r?\n/);
    let i = 0;
    while (i < lines.length && lines[i].trim() === '') i++;

    const titleMatch = i < lines.length ? TITLE_RE.exec(lines[i].trim()) : null;
    const title = titleMatch?.[1].trim() ?? '';
    if (!title) {
      throw new ParseError('Missing "Course Title:" header');
    }

    const course: Course = { title, course_link: null, instructor: null, lessons: [] };
    const preamble: Section = { lesson: null, body: [] };
    const sections: Section[] = [preamble];
    let current = preamble;
    let expectLessonLink = false;

    for (const raw of lines.slice(i + 1)) {
      const line = raw.trim();

      const lessonMatch = LESSON_RE.exec(line);
      if (lessonMatch) {
        const lessonNumber = Number(lessonMatch[1]);
        if (course.lessons.some((l) => l.lesson_number === lessonNumber)) {
          throw new ParseError(`Duplicate lesson number ${lessonNumber} in "${title}"`);
        }
        const lesson: Lesson = { lesson_number: lessonNumber, title: lessonMatch[2].trim(), lesson_link: null };
        course.lessons.push(lesson);
        current = { lesson, body: [] };
        sections.push(current);
        expectLessonLink = true;
        continue;
      }

      if (line === '') {
        current.body.push(raw);
        continue;
      }

      if (expectLessonLink && current.lesson) {
        expectLessonLink = false;
        const linkMatch = LESSON_LINK_RE.exec(line);
        if (linkMatch) {
          current.lesson.lesson_link = linkMatch[1].trim() || null;
          continue;
        }
      }

      if (current === preamble) {
        const linkMatch = LINK_RE.exec(line);
        if (linkMatch && course.course_link === null) {
          course.course_link = linkMatch[1].trim() || null;
          continue;
        }
        const instructorMatch = INSTRUCTOR_RE.exec(line);
        if (instructorMatch && course.instructor === null) {
          course.instructor = instructorMatch[1].trim() || null;
          continue;
        }
      }

      current.body.push(raw);
    }

    const chunks: CourseChunk[] = [];
    for (const section of sections) {
      const lessonNumber = section.lesson?.lesson_number ?? null;
      const prefix = lessonPrefix(title, lessonNumber);
      for (const w of splitIntoWindows(section.body.join('\n'), this.chunkSize, this.chunkOverlap)) {
        chunks.push({
          content: prefix + w.text,
          course_title: title,
          lesson_number: lessonNumber,
          chunk_index: chunks.length,
        });
      }
    }

    return { course, chunks };
  }
}
