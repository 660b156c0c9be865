export type TaskId = number;

export interface Task {
  taskId: TaskId;
  /** Free-form label, e.g. "Design" or "Data Analysis" */
  type: string;
  /** 0 = trivial, 1 = hardest */
  complexity: number;
  /** Hours */
  deadline: number;
}

export type NewTask = Omit<Task, 'taskId'>;
