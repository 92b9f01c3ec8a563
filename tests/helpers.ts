/**
 * Row factories shared by the unit tests
 */

import { AccountSession, EC2InstanceRow, ELBRow } from '../src/types'
import { createAccountSession } from '../src/utils/clients'

export function ec2Row(overrides: Partial<EC2InstanceRow> = {}): EC2InstanceRow {
  return {
    kind: 'ec2',
    account: 'myprod',
    region: 'us-east-1',
    name: 'prod-api-1',
    instanceId: 'i-0123456789abcdef0',
    instanceType: 't3.micro',
    state: 'running',
    availabilityZone: 'us-east-1a',
    privateIp: '10.0.1.15',
    publicIp: undefined,
    tags: { env: 'prod', team: 'platform' },
    securityGroups: ['web - sg-0aaa'],
    launchTime: new Date('2024-03-01T12:00:00.000Z'),
    ...overrides,
  }
}

export function elbRow(overrides: Partial<ELBRow> = {}): ELBRow {
  return {
    kind: 'elb',
    account: 'myprod',
    region: 'us-east-1',
    name: 'prod-web',
    dnsName: 'prod-web-123.us-east-1.elb.amazonaws.com',
    instanceIds: ['i-0aaa', 'i-0bbb'],
    securityGroups: ['sg-0ccc'],
    createdTime: new Date('2023-11-20T08:30:00.000Z'),
    ...overrides,
  }
}

export function session(account = 'myprod'): AccountSession {
  return createAccountSession(account)
}
