import { Knex } from 'knex';
import { z } from 'zod';
import { readInteger } from '../utils/fixedPoint';

const CountResultSchema = z.array(z.object({ total: z.union([z.number(), z.string(), z.bigint()]) }));

/** Counts the rows a filtered query would return, ignoring its ordering and paging. */
export const countRows = async (builder: Knex.QueryBuilder): Promise<number> => {
  const result: unknown = await builder.clone().clearOrder().clearSelect().count({ total: '*' });
  const [row] = CountResultSchema.parse(result);
  return row ? readInteger(row.total) : 0;
};
