/** Shape written to the JSON file. Positions are never persisted. */
export interface StoredTask {
  task: string;
  done: boolean;
  createdAt: string;
  completedAt?: string;
}

/** A task as handed to callers, with its position derived from list order. */
export interface Task extends StoredTask {
  position: number;
}

export interface TaskEnvelope {
  results: Task[];
  /** Unix seconds at which the response was built. */
  date: number;
  total_results: number;
}
