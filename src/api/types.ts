import type { Scaffolder } from '../scaffolding/factory.js';

export interface RouteOpts {
  scaffolder: Scaffolder;
}
