import type { Task, TaskId } from './task.js';
import type { User, UserId } from './user.js';
import type { ProgressStatus } from './progress.js';
import type { AssignmentConfidence } from './assignment.js';

export type SkillLevel = 'Expert' | 'Good' | 'Learning';

export interface TaskOverview extends Task {
  status: 'completed' | 'pending';
}

export interface ResultStats {
  totalCompleted: number;
  averageQuality: number;
  averageTimeTaken: number;
}

export interface UserPerformance {
  userId: UserId;
  name: string;
  averageQuality: number;
  averageTimeTaken: number;
  tasksDone: number;
  skillLevel: SkillLevel;
}

export interface TypeSkill {
  type: string;
  averageQuality: number;
  averageTimeTaken: number;
  skillLevel: SkillLevel;
}

export interface UserSkills {
  userId: UserId;
  name: string;
  skills: TypeSkill[];
}

export interface ActiveTaskView {
  taskId: TaskId;
  userId: UserId;
  userName: string;
  taskType: string;
  complexity: number;
  deadline: number;
  status: Exclude<ProgressStatus, 'completed'>;
  elapsedHours: number;
  latestPercent: number | null;
  latestNotes: string | null;
}

export interface DashboardSnapshot {
  users: User[];
  tasks: TaskOverview[];
  stats: ResultStats | null;
  userPerformance: UserPerformance[];
  skills: UserSkills[];
  activeTasks: ActiveTaskView[];
  model: { trained: boolean; mode: AssignmentConfidence };
}
