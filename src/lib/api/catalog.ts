/**
 * Unity Catalog API module (catalogs, schemas, tables)
 */

import type { CatalogInfo, SchemaInfo, TableInfo } from '../types.js'

import { BaseApi } from './base.js'

const UC = '/api/2.1/unity-catalog'

export class CatalogApi extends BaseApi {
  async deleteTable(fullName: string): Promise<void> {
    await this.httpDelete(`${UC}/tables/${encodeURIComponent(fullName)}`)
  }

  async getCatalog(name: string): Promise<CatalogInfo> {
    return this.httpGet(`${UC}/catalogs/${encodeURIComponent(name)}`)
  }

  async getSchema(fullName: string): Promise<SchemaInfo> {
    return this.httpGet(`${UC}/schemas/${encodeURIComponent(fullName)}`)
  }

  async getTable(fullName: string): Promise<TableInfo> {
    return this.httpGet(`${UC}/tables/${encodeURIComponent(fullName)}`)
  }

  async listCatalogs(): Promise<CatalogInfo[]> {
    const response = await this.httpGet<{ catalogs?: CatalogInfo[] }>(`${UC}/catalogs`)
    return response.catalogs ?? []
  }

  async listSchemas(catalogName: string): Promise<SchemaInfo[]> {
    const response = await this.httpGet<{ schemas?: SchemaInfo[] }>(`${UC}/schemas`, { catalog_name: catalogName }) // eslint-disable-line camelcase
    return response.schemas ?? []
  }

  async listTables(catalogName: string, schemaName: string, maxResults?: number): Promise<TableInfo[]> {
    const response = await this.httpGet<{ tables?: TableInfo[] }>(`${UC}/tables`, {
      catalog_name: catalogName, // eslint-disable-line camelcase
      max_results: maxResults, // eslint-disable-line camelcase
      schema_name: schemaName, // eslint-disable-line camelcase
    })
    return response.tables ?? []
  }
}
