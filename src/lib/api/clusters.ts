/**
 * Clusters API module
 */

import type { ClusterInfo, ClusterState, CreateClusterRequest } from '../types.js'

import { BaseApi } from './base.js'
import { pollUntil, type PollVerdict, type WaitOptions } from './wait.js'

export class ClustersApi extends BaseApi {
  async create(request: CreateClusterRequest): Promise<{ cluster_id: string }> {
    return this.httpPost('/api/2.1/clusters/create', request)
  }

  async get(clusterId: string): Promise<ClusterInfo> {
    return this.httpGet('/api/2.1/clusters/get', { cluster_id: clusterId })
  }

  async list(): Promise<ClusterInfo[]> {
    const response = await this.httpGet<{ clusters?: ClusterInfo[] }>('/api/2.1/clusters/list')
    return response.clusters ?? []
  }

  async permanentDelete(clusterId: string): Promise<void> {
    await this.httpPost('/api/2.1/clusters/permanent-delete', { cluster_id: clusterId })
  }

  async start(clusterId: string): Promise<void> {
    await this.httpPost('/api/2.1/clusters/start', { cluster_id: clusterId })
  }

  /**
   * Terminate (not delete); the cluster config is kept
   */
  async terminate(clusterId: string): Promise<void> {
    await this.httpPost('/api/2.1/clusters/delete', { cluster_id: clusterId })
  }

  /**
   * Block until the cluster reaches `target`. ERROR, or TERMINATED while
   * waiting for another state, fails the wait.
   */
  async waitForState(clusterId: string, target: ClusterState, options: Partial<WaitOptions> = {}): Promise<ClusterInfo> {
    return pollUntil(
      `cluster ${clusterId} to reach ${target}`,
      () => this.get(clusterId),
      (cluster): PollVerdict => {
        if (cluster.state === target) return 'done'
        if (cluster.state === 'ERROR' || (cluster.state === 'TERMINATED' && target !== 'TERMINATED')) {
          const detail = cluster.state_message ? ` (${cluster.state_message})` : ''
          return { failed: `cluster is ${cluster.state}${detail}` }
        }

        return 'pending'
      },
      options
    )
  }
}
