export { DrizzleGradebookStore } from './drizzle-store';
export type {
  AccountSyncPatch,
  AssignmentPatch,
  AssignmentWrites,
  CanvasAccountInput,
  CoursePatch,
  GradebookStore,
} from './types';
