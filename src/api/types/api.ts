import type { PageParams, PageResult } from '../../db/client';
import { pageRange } from '../../db/client';

// Request/Response types for API endpoints

export type PaginationParams = PageParams;

export interface PaginatedResponse<T> {
  data: T[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}

export function paginate<T>(result: PageResult<T>, params: PaginationParams): PaginatedResponse<T> {
  const { page, limit } = pageRange(params);
  return {
    data: result.data,
    pagination: {
      page,
      limit,
      total: result.count,
      totalPages: Math.ceil(result.count / limit),
    },
  };
}

export interface ServiceInfo {
  service: string;
  version: string;
  status: 'running';
}

export interface HealthResponse {
  status: 'healthy';
  loaded_adapters: string[];
}

export interface JobAccepted {
  job_id: number;
  status: 'pending';
}
