import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DocumentProcessor, type ParsedCourse } from '../../src/services/documentProcessor.js';
import { VectorIndex, contentId } from '../../src/services/vectorIndex.js';
import { MemoryVectorStore } from '../../src/services/vectorStore.js';
import { createVocabularyEmbedder, gadgetsFile, widgetsFile } from '../helpers/fakes.js';

const processor = new DocumentProcessor({ chunkSize: 800, chunkOverlap: 100 });

describe('VectorIndex', () => {
  let store: MemoryVectorStore;
  let index: VectorIndex;
  let widgets: ParsedCourse;
  let gadgets: ParsedCourse;

  beforeEach(async () => {
    store = new MemoryVectorStore();
    index = new VectorIndex(store, createVocabularyEmbedder(), { maxResults: 5 });
    widgets = await processor.processCourseDocument(widgetsFile);
    gadgets = await processor.processCourseDocument(gadgetsFile);
  });

  it('builds content ids from course title and chunk index', () => {
    expect(contentId({ course_title: 'Intro to Widgets', chunk_index: 3 })).toBe('Intro to Widgets_3');
  });

  it('stores one catalog entry and one content record per chunk', async () => {
    await index.replaceCourse(widgets.course, widgets.chunks);

    expect(await index.existingCourseTitles()).toEqual(['Intro to Widgets']);
    expect(await index.courseCount()).toBe(1);
    expect(await store.content.ids()).toEqual(['Intro to Widgets_0', 'Intro to Widgets_1']);
    const [catalog] = await store.catalog.get(['Intro to Widgets']);
    expect(catalog.metadata).toEqual({
      title: 'Intro to Widgets',
      instructor: 'Ada Example',
      course_link: 'https://example.com/widgets',
      lessons_json: JSON.stringify([
        { lesson_number: 1, lesson_title: 'Widget Basics', lesson_link: 'https://example.com/widgets/1' },
        { lesson_number: 2, lesson_title: 'Widget Assembly', lesson_link: 'https://example.com/widgets/2' },
      ]),
      lesson_count: 2,
    });
  });

  it('resolves a partial course name to the closest title', async () => {
    await index.replaceCourse(widgets.course, widgets.chunks);
    await index.replaceCourse(gadgets.course, gadgets.chunks);

    expect(await index.resolveCourseTitle('Widgets')).toBe('Intro to Widgets');
    const match = await index.matchCourse('gadget design');
    expect(match?.title).toBe('Advanced Gadget Design');
    // two of three title tokens shared: cosine = 2 / (sqrt(2) * sqrt(3))
    expect(match?.similarity).toBeCloseTo(2 / Math.sqrt(6), 10);
    expect(match?.distance).toBeCloseTo(1 - 2 / Math.sqrt(6), 10);
  });

  it('resolves an exact full title to itself', async () => {
    await index.replaceCourse(widgets.course, widgets.chunks);
    await index.replaceCourse(gadgets.course, gadgets.chunks);

    expect(await index.resolveCourseTitle('Intro to Widgets')).toBe('Intro to Widgets');
    expect(await index.resolveCourseTitle('Advanced Gadget Design')).toBe('Advanced Gadget Design');
    expect((await index.matchCourse('Intro to Widgets'))?.distance).toBeCloseTo(0, 10);
  });

  it('returns no match when the catalog is empty', async () => {
    expect(await index.matchCourse('anything')).toBeNull();
  });

  it('filters content by resolved course and lesson', async () => {
    await index.replaceCourse(widgets.course, widgets.chunks);
    await index.replaceCourse(gadgets.course, gadgets.chunks);

    const results = await index.search({ query: 'knob', course_name: 'widgets', lesson_number: 2 });

    expect(results).toEqual({
      ok: true,
      hits: [
        {
          document: widgets.chunks[1].content,
          metadata: { course_title: 'Intro to Widgets', lesson_number: 2, chunk_index: 1 },
          distance: expect.any(Number),
        },
      ],
    });
  });

  it('ranks the closest chunk first across courses', async () => {
    await index.replaceCourse(widgets.course, widgets.chunks);
    await index.replaceCourse(gadgets.course, gadgets.chunks);

    const results = await index.search({ query: 'calibrate sensor' });

    if (!results.ok) throw new Error(results.error);
    expect(results.hits).toHaveLength(4);
    expect(results.hits[0].metadata).toEqual({
      course_title: 'Advanced Gadget Design',
      lesson_number: 1,
      chunk_index: 1,
    });
    const distances = results.hits.map((h) => h.distance);
    expect(distances).toEqual([...distances].sort((a, b) => a - b));
  });

  it('returns identical ordered hits for a repeated search, breaking distance ties by id', async () => {
    await index.replaceCourse(widgets.course, widgets.chunks);
    await index.replaceCourse(gadgets.course, gadgets.chunks);

    // a word no chunk contains puts every chunk at distance 1
    const first = await index.search({ query: 'zebra' });
    const second = await index.search({ query: 'zebra' });

    expect(second).toEqual(first);
    if (!first.ok) throw new Error(first.error);
    expect(first.hits.map((h) => h.distance)).toEqual([1, 1, 1, 1]);
    expect(first.hits.map((h) => [h.metadata.course_title, h.metadata.chunk_index])).toEqual([
      ['Advanced Gadget Design', 0],
      ['Advanced Gadget Design', 1],
      ['Intro to Widgets', 0],
      ['Intro to Widgets', 1],
    ]);
  });

  it('caps hits at maxResults unless a limit is given', async () => {
    const small = new VectorIndex(store, createVocabularyEmbedder(), { maxResults: 1 });
    await small.replaceCourse(widgets.course, widgets.chunks);

    const capped = await small.search({ query: 'knob' });
    const wider = await small.search({ query: 'knob', limit: 10 });

    expect(capped.ok && capped.hits.length).toBe(1);
    expect(wider.ok && wider.hits.length).toBe(2);
  });

  it('reports an unknown course when nothing is indexed', async () => {
    expect(await index.search({ query: 'knob', course_name: 'Widgets' })).toEqual({
      ok: false,
      error: "No course found matching 'Widgets'",
    });
  });

  it('turns store and embedding failures into an error result', async () => {
    const failing = new VectorIndex(store, () => Promise.reject(new Error('embedding service down')), {
      maxResults: 5,
    });

    expect(await failing.search({ query: 'knob' })).toEqual({
      ok: false,
      error: 'Search error: embedding service down',
    });
  });

  it('drops chunks left over from a previous version of the course', async () => {
    await index.replaceCourse(widgets.course, widgets.chunks);
    await index.replaceCourse(widgets.course, widgets.chunks.slice(0, 1));

    expect(await store.content.ids()).toEqual(['Intro to Widgets_0']);
    expect(await index.courseCount()).toBe(1);
  });

  it('rejects chunks that belong to another course', async () => {
    await expect(index.replaceCourse(widgets.course, gadgets.chunks)).rejects.toThrow(
      'Chunk 0 belongs to "Advanced Gadget Design", not "Intro to Widgets"',
    );
    expect(await index.courseCount()).toBe(0);
  });

  it('leaves the previous course intact when a write fails mid-replace', async () => {
    await index.replaceCourse(widgets.course, widgets.chunks);
    vi.spyOn(store.content, 'upsert').mockRejectedValueOnce(new Error('disk full'));

    const renamed = { ...widgets.course, instructor: 'Someone Else' };
    await expect(index.replaceCourse(renamed, widgets.chunks)).rejects.toThrow('disk full');

    expect(await store.content.ids()).toEqual(['Intro to Widgets_0', 'Intro to Widgets_1']);
    expect((await index.courseOutline('Intro to Widgets'))?.instructor).toBe('Ada Example');
  });

  it('upserts catalog entries and chunks separately', async () => {
    await index.upsertCourse(widgets.course);
    await index.upsertChunks(widgets.chunks);
    await index.upsertChunks([]);

    expect(await index.courseCount()).toBe(1);
    expect(await store.content.count()).toBe(2);
  });

  it('maps lesson numbers to links, skipping lessons without one', async () => {
    await index.replaceCourse(gadgets.course, gadgets.chunks);

    expect(await index.lessonLinks('Advanced Gadget Design')).toEqual(new Map([[1, 'https://example.com/gadgets/1']]));
    expect(await index.lessonLinks('Unknown')).toEqual(new Map());
  });

  it('rebuilds the course outline from the catalog', async () => {
    await index.replaceCourse(gadgets.course, gadgets.chunks);

    expect(await index.courseOutline('Advanced Gadget Design')).toEqual(gadgets.course);
    expect(await index.courseOutline('Unknown')).toBeNull();
  });

  it('clears both collections', async () => {
    await index.replaceCourse(widgets.course, widgets.chunks);
    await index.clearAll();

    expect(await index.courseCount()).toBe(0);
    expect(await store.content.count()).toBe(0);
  });
});
