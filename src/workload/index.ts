export { generateWorkload, workloadOptionsSchema } from './generator';
export type { WorkloadOptions } from './generator';
