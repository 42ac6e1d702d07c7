export { calculateMedian, summarize } from './statistics'
export type { Distribution } from './statistics'
export { sleep } from './sleep'
export { backoffDelay } from './backoff'
