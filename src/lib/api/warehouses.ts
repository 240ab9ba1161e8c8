/**
 * SQL warehouses API module
 */

import type { WarehouseInfo } from '../types.js'

import { BaseApi } from './base.js'

export class WarehousesApi extends BaseApi {
  async get(warehouseId: string): Promise<WarehouseInfo> {
    return this.httpGet(`/api/2.0/sql/warehouses/${encodeURIComponent(warehouseId)}`)
  }

  async list(): Promise<WarehouseInfo[]> {
    const response = await this.httpGet<{ warehouses?: WarehouseInfo[] }>('/api/2.0/sql/warehouses')
    return response.warehouses ?? []
  }

  async start(warehouseId: string): Promise<void> {
    await this.httpPost(`/api/2.0/sql/warehouses/${encodeURIComponent(warehouseId)}/start`)
  }

  async stop(warehouseId: string): Promise<void> {
    await this.httpPost(`/api/2.0/sql/warehouses/${encodeURIComponent(warehouseId)}/stop`)
  }
}
