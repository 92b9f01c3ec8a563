// File: src/templates/ec2.ts
// Table columns for EC2 instances

import { ColumnSpec, EC2InstanceRow } from '../types'
import { tagStrings } from '../services/ec2'

const NOT_AVAILABLE = 'n/a'

/**
 * Columns of the ec2 table, in display order
 *
 * Type, State, Security Groups, Launch Time and Region only show with --verbose.
 */
export const EC2_COLUMNS: ColumnSpec<EC2InstanceRow>[] = [
  { name: 'name', title: 'Name', value: (row) => row.name },
  { name: 'instanceId', title: 'Instance ID', value: (row) => row.instanceId },
  { name: 'instanceType', title: 'Type', value: (row) => row.instanceType, verbose: true },
  { name: 'state', title: 'State', value: (row) => row.state, verbose: true },
  { name: 'placement', title: 'Placement', value: (row) => row.availabilityZone },
  { name: 'privateIp', title: 'Private IP', value: (row) => row.privateIp ?? NOT_AVAILABLE },
  { name: 'publicIp', title: 'Public IP', value: (row) => row.publicIp ?? NOT_AVAILABLE },
  { name: 'tags', title: 'Tags', value: (row) => tagStrings(row).sort().join(', ') },
  { name: 'securityGroups', title: 'Security Groups', value: (row) => row.securityGroups.join(', '), verbose: true },
  {
    name: 'launchTime',
    title: 'Launch Time',
    value: (row) => row.launchTime?.toISOString() ?? NOT_AVAILABLE,
    verbose: true,
  },
  { name: 'region', title: 'Region', value: (row) => row.region, verbose: true },
  { name: 'account', title: 'Account', value: (row) => row.account },
]
