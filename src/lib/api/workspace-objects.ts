/**
 * Workspace objects API module (notebooks, files, directories)
 */

import type { ExportedObject, ExportFormat, WorkspaceObject } from '../types.js'

import { BaseApi } from './base.js'

export class WorkspaceObjectsApi extends BaseApi {
  async delete(path: string, recursive = false): Promise<void> {
    await this.httpPost('/api/2.0/workspace/delete', { path, recursive })
  }

  async export(path: string, format: ExportFormat = 'SOURCE'): Promise<ExportedObject> {
    return this.httpGet('/api/2.0/workspace/export', { format, path })
  }

  async getStatus(path: string): Promise<WorkspaceObject> {
    return this.httpGet('/api/2.0/workspace/get-status', { path })
  }

  async list(path: string): Promise<WorkspaceObject[]> {
    const response = await this.httpGet<{ objects?: WorkspaceObject[] }>('/api/2.0/workspace/list', { path })
    return response.objects ?? []
  }

  async mkdirs(path: string): Promise<void> {
    await this.httpPost('/api/2.0/workspace/mkdirs', { path })
  }
}
