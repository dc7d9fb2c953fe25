import {
  pgSchema,
  uuid,
  text,
  timestamp,
  integer,
  real,
  index,
  check,
  boolean,
  jsonb,
  uniqueIndex,
  primaryKey,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

import type { SyncCheckpoint, SyncResult } from '@/lib/sync/types';

export const gradebookSchema = pgSchema('gradebook');

// Canvas credentials per owner - no users table, owner ids come from the auth layer
export const canvasAccounts = gradebookSchema.table('canvas_accounts', {
  ownerId: text('owner_id').primaryKey(),
  baseUrl: text('base_url').notNull(),
  // iv:authTag:ciphertext (base64), see lib/crypto/encryption.ts
  accessTokenEncrypted: text('access_token_encrypted').notNull(),
  timezone: text('timezone'),
  lastSyncedAt: timestamp('last_synced_at', { withTimezone: true }),
  lastSyncCourses: integer('last_sync_courses').notNull().default(0),
  lastSyncAssignments: integer('last_sync_assignments').notNull().default(0),
  lastSyncCategories: integer('last_sync_categories').notNull().default(0),
  // 'idle' | 'running' | 'completed' | 'failed'
  syncStatus: text('sync_status').notNull().default('idle'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow(),
});

export type CanvasAccount = typeof canvasAccounts.$inferSelect;
export type NewCanvasAccount = typeof canvasAccounts.$inferInsert;

export const terms = gradebookSchema.table(
  'terms',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    ownerId: text('owner_id').notNull(),
    nickname: text('nickname').notNull(),
    season: text('season').notNull(),
    year: integer('year').notNull(),
    schoolName: text('school_name').notNull(),
    startDate: timestamp('start_date', { withTimezone: true }),
    endDate: timestamp('end_date', { withTimezone: true }),
    active: boolean('active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('idx_terms_owner_season_year').on(
      table.ownerId,
      table.season,
      table.year
    ),
    check(
      'season_check',
      sql`${table.season} IN ('Spring', 'Summer', 'Fall', 'Winter')`
    ),
  ]
);

export type Term = typeof terms.$inferSelect;
export type NewTerm = typeof terms.$inferInsert;

export const courses = gradebookSchema.table(
  'courses',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    ownerId: text('owner_id').notNull(),
    termId: uuid('term_id')
      .notNull()
      .references(() => terms.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    credits: real('credits').notNull().default(0),
    isWeighted: boolean('is_weighted').notNull().default(true),
    remoteCourseId: text('remote_course_id'),
    lastSyncedAt: timestamp('last_synced_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('idx_courses_term_id').on(table.termId),
    uniqueIndex('idx_courses_remote_term').on(
      table.remoteCourseId,
      table.termId
    ),
  ]
);

export type Course = typeof courses.$inferSelect;
export type NewCourse = typeof courses.$inferInsert;

export const gradeCategories = gradebookSchema.table(
  'grade_categories',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    courseId: uuid('course_id')
      .notNull()
      .references(() => courses.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    // Fraction of the course grade, 0.0 - 1.0
    weight: real('weight').notNull(),
  },
  (table) => [
    uniqueIndex('idx_grade_categories_course_name').on(
      table.courseId,
      table.name
    ),
  ]
);

export type GradeCategory = typeof gradeCategories.$inferSelect;
export type NewGradeCategory = typeof gradeCategories.$inferInsert;

export const assignments = gradebookSchema.table(
  'assignments',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    courseId: uuid('course_id')
      .notNull()
      .references(() => courses.id, { onDelete: 'cascade' }),
    categoryId: uuid('category_id').references(() => gradeCategories.id, {
      onDelete: 'set null',
    }),
    name: text('name').notNull(),
    score: real('score'),
    maxScore: real('max_score').notNull(),
    // Local wall-clock time in the sync timezone ("YYYY-MM-DD HH:mm:ss")
    dueDate: timestamp('due_date', { mode: 'string' }),
    remoteAssignmentId: text('remote_assignment_id').notNull(),
    remoteCourseId: text('remote_course_id'),
    completed: boolean('completed').notNull().default(false),
    isSubmitted: boolean('is_submitted').notNull().default(false),
    isMissing: boolean('is_missing').notNull().default(false),
    isExtraCredit: boolean('is_extra_credit').notNull().default(false),
    lastSyncedAt: timestamp('last_synced_at', { withTimezone: true }),
  },
  (table) => [
    index('idx_assignments_course_id').on(table.courseId),
    uniqueIndex('idx_assignments_remote_course').on(
      table.remoteAssignmentId,
      table.courseId
    ),
  ]
);

export type Assignment = typeof assignments.$inferSelect;
export type NewAssignment = typeof assignments.$inferInsert;

export const syncProgress = gradebookSchema.table(
  'sync_progress',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    ownerId: text('owner_id').notNull(),
    taskId: text('task_id').notNull(),
    // 'all' | 'term' | 'course'
    scope: text('scope').notNull(),
    targetId: text('target_id'),
    progressPercent: integer('progress_percent').notNull().default(0),
    completedItems: integer('completed_items').notNull().default(0),
    totalItems: integer('total_items').notNull().default(0),
    currentOperation: text('current_operation').notNull().default(''),
    currentItem: text('current_item').notNull().default(''),
    elapsedTime: real('elapsed_time').notNull().default(0),
    errors: jsonb('errors').$type<string[]>().notNull().default([]),
    isComplete: boolean('is_complete').notNull().default(false),
    // 'running' | 'completed' | 'failed' | 'cancelled'
    status: text('status').notNull().default('running'),
    result: jsonb('result').$type<SyncResult>(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('idx_sync_progress_owner').on(table.ownerId, table.isComplete),
    index('idx_sync_progress_created_at').on(table.createdAt),
  ]
);

export type SyncProgressRecord = typeof syncProgress.$inferSelect;
export type NewSyncProgressRecord = typeof syncProgress.$inferInsert;

export const syncCheckpoints = gradebookSchema.table(
  'sync_checkpoints',
  {
    ownerId: text('owner_id').notNull(),
    scope: text('scope').notNull(),
    data: jsonb('data').$type<SyncCheckpoint>().notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.ownerId, table.scope] })]
);

export type SyncCheckpointRow = typeof syncCheckpoints.$inferSelect;

export const syncMetrics = gradebookSchema.table(
  'sync_metrics',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    ownerId: text('owner_id').notNull(),
    taskId: text('task_id').notNull(),
    scope: text('scope').notNull(),
    status: text('status').notNull(),
    apiCalls: integer('api_calls').notNull().default(0),
    apiCallsFailed: integer('api_calls_failed').notNull().default(0),
    rateLimitHits: integer('rate_limit_hits').notNull().default(0),
    apiDurationMs: real('api_duration_ms').notNull().default(0),
    coursesProcessed: integer('courses_processed').notNull().default(0),
    assignmentsProcessed: integer('assignments_processed').notNull().default(0),
    categoriesCreated: integer('categories_created').notNull().default(0),
    errorMessage: text('error_message'),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    finishedAt: timestamp('finished_at', { withTimezone: true }).notNull(),
    durationSeconds: real('duration_seconds').notNull(),
  },
  (table) => [index('idx_sync_metrics_owner').on(table.ownerId)]
);

export type SyncMetricsRecord = typeof syncMetrics.$inferSelect;
export type NewSyncMetricsRecord = typeof syncMetrics.$inferInsert;
