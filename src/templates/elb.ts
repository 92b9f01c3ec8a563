// File: src/templates/elb.ts
// Table columns for Classic Load Balancers

import { ColumnSpec, ELBRow } from '../types'

/**
 * Columns of the elb table, in display order
 */
export const ELB_COLUMNS: ColumnSpec<ELBRow>[] = [
  { name: 'name', title: 'Name', value: (row) => row.name },
  { name: 'dnsName', title: 'DNS Name', value: (row) => row.dnsName },
  { name: 'instances', title: 'EC2 Instances', value: (row) => row.instanceIds.join(', ') },
  { name: 'securityGroups', title: 'Security Groups', value: (row) => row.securityGroups.join(', '), verbose: true },
  { name: 'createdTime', title: 'Created Time', value: (row) => row.createdTime?.toISOString() ?? 'n/a', verbose: true },
  { name: 'region', title: 'Region', value: (row) => row.region, verbose: true },
  { name: 'account', title: 'Account', value: (row) => row.account },
]
