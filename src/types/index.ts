export * from './finding.js'
export * from './report.js'
export type { ScanPolicy, PolicyOverrides } from './policy.js'
