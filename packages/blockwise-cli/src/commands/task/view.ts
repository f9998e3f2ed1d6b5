import type { Task } from 'blockwise-core';

/** Wire shape of a task in command output. */
export interface TaskView {
  task_id: string;
  title: string;
  description: string | null;
  project: string | null;
  priority: string;
  tags: string[];
  status: string;
  blockers: string[];
  created_at: string;
  updated_at: string;
}

export function toTaskView(task: Task): TaskView {
  return {
    task_id: task.id,
    title: task.title,
    description: task.description,
    project: task.project,
    priority: task.priority,
    tags: task.tags,
    status: task.status,
    blockers: task.blockers,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}
