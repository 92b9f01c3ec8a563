// File: src/services/index.ts
// Export all services

// Account/region fan-out shared by every resource kind
export * from './search'

// Substring filtering of normalized rows
export * from './filter'

// EC2 service - describe and normalize EC2 instances, ec2 filter criteria
export * from './ec2'

// ELB service - describe and normalize Classic Load Balancers, elb filter criteria
export * from './elb'
