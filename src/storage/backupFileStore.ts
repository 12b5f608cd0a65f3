/**
 * Backup directory loader.
 *
 * A backup is a directory holding `entities.json` and `timelines.json`. The
 * documents are validated and flattened into a TimelineDataset, then served
 * read-only through an InMemoryTimelineStore.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { DateError, createDate, dateFromParts } from '@engine/date';
import { EntityError, createEntity } from '@engine/models';
import type { Entity, Tag, Timeline } from '@engine/models';
import { InMemoryTimelineStore } from './memoryStore';
import type {
  EntityTagRecord,
  SubtimelineEdge,
  TimelineDataset,
  TimelineEntityLink,
  TimelineTagRecord,
} from './types';

export const ENTITIES_FILE = 'entities.json';
export const TIMELINES_FILE = 'timelines.json';

// =============================================================================
// Document Schemas
// =============================================================================

const optionalInt = z.number().int().nullable().optional().transform(v => v ?? null);

const TagSchema = z.object({
  name: z.string().nullable().optional().transform(v => v ?? null),
  value: z.string(),
});

const TagListSchema = z.array(TagSchema).nullable().optional().transform(v => v ?? []);

const ReducedSchema = z.object({ id: z.string().min(1), name: z.string() });

const ReducedListSchema = z.array(ReducedSchema).nullable().optional().transform(v => v ?? []);

const StartDateSchema = z.object({
  year: z.number().int(),
  month: optionalInt,
  day: optionalInt,
});

/** `{ year: null, month: null, day: null }` is written for "no end date" */
const EndDateSchema = z.object({
  year: optionalInt,
  month: optionalInt,
  day: optionalInt,
}).nullable().optional().transform(v => v ?? null);

export const BackupEntitySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  start: StartDateSchema,
  end: EndDateSchema,
  tags: TagListSchema,
});

export const BackupTimelineSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  bool_expr: z.string().nullable().optional().transform(v => v ?? null),
  entities: ReducedListSchema,
  subtimelines: ReducedListSchema,
  tags: TagListSchema,
});

export type BackupEntity = z.infer<typeof BackupEntitySchema>;
export type BackupTimeline = z.infer<typeof BackupTimelineSchema>;

// =============================================================================
// Errors
// =============================================================================

export class BackupFormatError extends Error {
  readonly file: string;
  readonly issues: readonly string[];

  constructor(file: string, issues: readonly string[]) {
    super(`Invalid backup file ${file}: ${issues.join('; ')}`);
    this.name = 'BackupFormatError';
    this.file = file;
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

// =============================================================================
// Conversion
// =============================================================================

function toEntity(raw: BackupEntity): Entity {
  const start = createDate(raw.start.year, raw.start.month, raw.start.day);
  const end = raw.end === null ? null : dateFromParts(raw.end.year, raw.end.month, raw.end.day);
  return createEntity({ id: raw.id, name: raw.name, start, end });
}

function toTags(tags: readonly { name: string | null; value: string }[]): Tag[] {
  return tags.map(tag => ({ name: tag.name, value: tag.value }));
}

/**
 * Validate parsed backup documents and flatten them into relational tables.
 *
 * @throws BackupFormatError when either document does not match its schema,
 *   or an entity's dates are invalid
 */
export function parseBackup(entitiesDocument: unknown, timelinesDocument: unknown): TimelineDataset {
  const entitiesResult = z.array(BackupEntitySchema).safeParse(entitiesDocument);
  if (!entitiesResult.success) {
    throw new BackupFormatError(ENTITIES_FILE, formatIssues(entitiesResult.error));
  }

  const timelinesResult = z.array(BackupTimelineSchema).safeParse(timelinesDocument);
  if (!timelinesResult.success) {
    throw new BackupFormatError(TIMELINES_FILE, formatIssues(timelinesResult.error));
  }

  const entities: Entity[] = [];
  const entityTags: EntityTagRecord[] = [];
  const issues: string[] = [];

  entitiesResult.data.forEach((raw, index) => {
    try {
      entities.push(toEntity(raw));
      for (const tag of toTags(raw.tags)) {
        entityTags.push({ entityId: raw.id, tag });
      }
    } catch (error) {
      if (error instanceof DateError || error instanceof EntityError) {
        issues.push(`${index}: ${error.message}`);
        return;
      }
      throw error;
    }
  });

  if (issues.length > 0) {
    throw new BackupFormatError(ENTITIES_FILE, issues);
  }

  const timelines: Timeline[] = [];
  const timelineTags: TimelineTagRecord[] = [];
  const subtimelines: SubtimelineEdge[] = [];
  const timelineEntities: TimelineEntityLink[] = [];

  for (const raw of timelinesResult.data) {
    timelines.push({ id: raw.id, name: raw.name, boolExpression: raw.bool_expr });
    for (const tag of toTags(raw.tags)) {
      timelineTags.push({ timelineId: raw.id, tag });
    }
    for (const child of raw.subtimelines) {
      subtimelines.push({ parentId: raw.id, childId: child.id });
    }
    for (const entity of raw.entities) {
      timelineEntities.push({ timelineId: raw.id, entityId: entity.id });
    }
  }

  return { entities, entityTags, timelines, timelineTags, subtimelines, timelineEntities };
}

// =============================================================================
// File Loading
// =============================================================================

async function readJson(filePath: string): Promise<unknown> {
  const text = await readFile(filePath, 'utf8');
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BackupFormatError(path.basename(filePath), [message]);
  }
}

/**
 * Load a backup directory into a read-only store.
 */
export async function loadBackupDirectory(directory: string): Promise<InMemoryTimelineStore> {
  try {
    const [entitiesDocument, timelinesDocument] = await Promise.all([
      readJson(path.join(directory, ENTITIES_FILE)),
      readJson(path.join(directory, TIMELINES_FILE)),
    ]);
    const dataset = parseBackup(entitiesDocument, timelinesDocument);
    console.log(
      `[BackupFileStore] Loaded ${dataset.entities.length} entities and ${dataset.timelines.length} timelines from ${directory}`
    );
    return new InMemoryTimelineStore(dataset);
  } catch (error) {
    console.error('[BackupFileStore] Error loading backup:', error);
    throw error;
  }
}
