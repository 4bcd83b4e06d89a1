export { aggregate, describeCounts, summaryCounts } from './aggregate'
export type { SummaryCounts } from './aggregate'
