import { InfinityPaginationResponseDto } from './dto/infinity-pagination-response.dto';
import { IPaginationOptions } from './types/pagination-options';

/**
 * Wrap one page of results. `data` may carry one extra row fetched past the
 * limit; its presence is what sets `hasNextPage`.
 */
export const infinityPagination = <T>(
  data: T[],
  options: IPaginationOptions,
): InfinityPaginationResponseDto<T> => {
  return {
    data: data.slice(0, options.limit),
    hasNextPage: data.length > options.limit,
  };
};
