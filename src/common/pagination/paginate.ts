import { BadRequestException } from '@nestjs/common';
import { FindManyOptions, ObjectLiteral, Repository } from 'typeorm';
import { PaginationQueryDto } from './pagination-query.dto';

export const DEFAULT_PER_PAGE = 10;
export const MAX_PER_PAGE = 100;

export interface PageRequest {
  page: number;
  perPage: number;
}

/** Wire shape shared by every listing endpoint. */
export interface Page<T> {
  items: T[];
  total: number;
  pages: number;
  current_page: number;
  per_page: number;
}

/**
 * One policy for every listing: a page below 1 is rejected, and `per_page`
 * defaults to 10 and is capped at 100.
 */
export function toPageRequest(query: PaginationQueryDto): PageRequest {
  const page = query.page ?? 1;
  const perPage = query.per_page ?? DEFAULT_PER_PAGE;

  if (!Number.isInteger(page) || page < 1) {
    throw new BadRequestException('Page number must be greater than 0');
  }
  if (!Number.isInteger(perPage) || perPage < 1) {
    throw new BadRequestException('per_page must be greater than 0');
  }

  return { page, perPage: Math.min(perPage, MAX_PER_PAGE) };
}

export async function paginate<T extends ObjectLiteral>(
  repository: Repository<T>,
  request: PageRequest,
  options: FindManyOptions<T> = {},
): Promise<Page<T>> {
  const { page, perPage } = request;

  const [items, total] = await repository.findAndCount({
    ...options,
    skip: (page - 1) * perPage,
    take: perPage,
  });

  return {
    items,
    total,
    pages: Math.ceil(total / perPage),
    current_page: page,
    per_page: perPage,
  };
}

export function mapPage<T, R>(page: Page<T>, map: (item: T) => R): Page<R> {
  return { ...page, items: page.items.map(map) };
}
