export interface PaginationDto {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}

export interface PaginatedResponseDto<T> {
  items: T[];
  pagination: PaginationDto;
}

export function paginate<T>(items: T[], total: number, page: number, limit: number): PaginatedResponseDto<T> {
  return {
    items,
    pagination: { page, limit, total, totalPages: Math.ceil(total / limit) },
  };
}
