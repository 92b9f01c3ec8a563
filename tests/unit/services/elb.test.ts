/**
 * Unit tests for the Classic ELB fetcher
 */

import { DescribeLoadBalancersCommand, ElasticLoadBalancingClient } from '@aws-sdk/client-elastic-load-balancing'
import { mockClient } from 'aws-sdk-client-mock'
import { beforeEach, describe, expect, it } from 'vitest'
import { fetchLoadBalancers, normalizeLoadBalancer } from '../../../src/services/elb'
import { session } from '../../helpers'

const elbMock = mockClient(ElasticLoadBalancingClient)

describe('normalizeLoadBalancer', () => {
  it('collects attached instance ids', () => {
    const row = normalizeLoadBalancer(
      {
        LoadBalancerName: 'staging-web',
        DNSName: 'staging-web-42.us-west-2.elb.amazonaws.com',
        Instances: [{ InstanceId: 'i-0aaa' }, {}, { InstanceId: 'i-0bbb' }],
        SecurityGroups: ['sg-0ccc'],
        CreatedTime: new Date('2023-01-15T00:00:00.000Z'),
      },
      'mystaging',
      'us-west-2',
    )

    expect(row).toEqual({
      kind: 'elb',
      account: 'mystaging',
      region: 'us-west-2',
      name: 'staging-web',
      dnsName: 'staging-web-42.us-west-2.elb.amazonaws.com',
      instanceIds: ['i-0aaa', 'i-0bbb'],
      securityGroups: ['sg-0ccc'],
      createdTime: new Date('2023-01-15T00:00:00.000Z'),
    })
  })

  it('treats absent instances and security groups as empty', () => {
    const row = normalizeLoadBalancer({ LoadBalancerName: 'lb', DNSName: 'lb.elb.amazonaws.com' }, 'a', 'r')

    expect(row.instanceIds).toEqual([])
    expect(row.securityGroups).toEqual([])
  })

  it('fails on a missing name', () => {
    expect(() => normalizeLoadBalancer({ DNSName: 'lb.elb.amazonaws.com' }, 'a', 'r')).toThrow(
      'Load balancer is missing required field LoadBalancerName',
    )
  })

  it('fails on a missing DNS name', () => {
    expect(() => normalizeLoadBalancer({ LoadBalancerName: 'lb' }, 'a', 'r')).toThrow(
      'Load balancer lb is missing required field DNSName',
    )
  })
})

describe('fetchLoadBalancers', () => {
  beforeEach(() => {
    elbMock.reset()
  })

  it('follows markers and normalizes every description', async () => {
    elbMock
      .on(DescribeLoadBalancersCommand)
      .resolvesOnce({
        LoadBalancerDescriptions: [{ LoadBalancerName: 'one', DNSName: 'one.elb.amazonaws.com' }],
        NextMarker: 'next',
      })
      .resolvesOnce({
        LoadBalancerDescriptions: [{ LoadBalancerName: 'two', DNSName: 'two.elb.amazonaws.com' }],
      })

    const rows = await fetchLoadBalancers(session('myprod'), 'us-east-1')

    expect(rows.map((row) => [row.name, row.account, row.region])).toEqual([
      ['one', 'myprod', 'us-east-1'],
      ['two', 'myprod', 'us-east-1'],
    ])
    expect(elbMock.commandCalls(DescribeLoadBalancersCommand)[1].args[0].input.Marker).toBe('next')
  })
})
