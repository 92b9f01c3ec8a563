// File: src/templates/index.ts
// Export all table templates

export * from './ec2'
export * from './elb'
