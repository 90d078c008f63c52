import type { AppConfig } from '../config.js';
import type { Repository } from '../git.js';
import type { GenerationBackend } from '../model/backend.js';
import type { Terminal } from './ui.js';

/** Passed explicitly into every flow; there is no module-level repository or config. */
export interface FlowContext {
  config: AppConfig;
  repo: Repository;
  backend: GenerationBackend;
  term: Terminal;
}
