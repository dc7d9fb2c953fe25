import { describe, it, expect } from 'vitest';
import { getTableName } from 'drizzle-orm';
import {
  assignments,
  canvasAccounts,
  courses,
  gradebookSchema,
  gradeCategories,
  syncCheckpoints,
  syncMetrics,
  syncProgress,
  terms,
} from '@/lib/db/schema';

describe('Database Schema', () => {
  describe('gradebookSchema', () => {
    it('should use the gradebook schema namespace', () => {
      expect(gradebookSchema.schemaName).toBe('gradebook');
    });
  });

  describe('canvasAccounts table', () => {
    it('should have correct table name', () => {
      expect(getTableName(canvasAccounts)).toBe('canvas_accounts');
    });

    it('should have required columns', () => {
      const columns = Object.keys(canvasAccounts);
      expect(columns).toContain('ownerId');
      expect(columns).toContain('baseUrl');
      expect(columns).toContain('accessTokenEncrypted');
      expect(columns).toContain('lastSyncedAt');
      expect(columns).toContain('syncStatus');
    });
  });

  describe('terms table', () => {
    it('should have correct table name', () => {
      expect(getTableName(terms)).toBe('terms');
    });

    it('should have required columns', () => {
      const columns = Object.keys(terms);
      expect(columns).toContain('ownerId');
      expect(columns).toContain('season');
      expect(columns).toContain('year');
      expect(columns).toContain('active');
    });
  });

  describe('courses table', () => {
    it('should have correct table name', () => {
      expect(getTableName(courses)).toBe('courses');
    });

    it('should link to terms and Canvas', () => {
      const columns = Object.keys(courses);
      expect(columns).toContain('termId');
      expect(columns).toContain('remoteCourseId');
      expect(columns).toContain('credits');
      expect(columns).toContain('isWeighted');
    });
  });

  describe('gradeCategories table', () => {
    it('should have correct table name', () => {
      expect(getTableName(gradeCategories)).toBe('grade_categories');
    });

    it('should have required columns', () => {
      const columns = Object.keys(gradeCategories);
      expect(columns).toContain('courseId');
      expect(columns).toContain('name');
      expect(columns).toContain('weight');
    });
  });

  describe('assignments table', () => {
    it('should have correct table name', () => {
      expect(getTableName(assignments)).toBe('assignments');
    });

    it('should have submission status columns', () => {
      const columns = Object.keys(assignments);
      expect(columns).toContain('remoteAssignmentId');
      expect(columns).toContain('dueDate');
      expect(columns).toContain('isSubmitted');
      expect(columns).toContain('isMissing');
      expect(columns).toContain('completed');
      expect(columns).toContain('isExtraCredit');
    });
  });

  describe('sync tables', () => {
    it('should have correct table names', () => {
      expect(getTableName(syncProgress)).toBe('sync_progress');
      expect(getTableName(syncCheckpoints)).toBe('sync_checkpoints');
      expect(getTableName(syncMetrics)).toBe('sync_metrics');
    });

    it('should store progress and checkpoints as JSON', () => {
      expect(syncProgress.errors.dataType).toBe('json');
      expect(syncProgress.result.dataType).toBe('json');
      expect(syncCheckpoints.data.dataType).toBe('json');
    });
  });
});
