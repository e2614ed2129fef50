import type { Todo } from '../schema/index.js';

export interface LoadWarning {
  list: string;
  file: string;
  line?: number;
  message: string;
}

export type { Todo };
