import type { BlockRecord } from "./BlockRecord";
import type { ValuesUnion } from "./ValuesUnion";

export const FetchResultType = {
  FOUND: "FOUND",
  // The height is beyond the source's current tip
  NOT_YET_AVAILABLE: "NOT_YET_AVAILABLE",
} as const;

export type FetchResultType = ValuesUnion<typeof FetchResultType>;

export type FetchResult =
  | {
      type: typeof FetchResultType.FOUND;
      record: BlockRecord;
    }
  | {
      type: typeof FetchResultType.NOT_YET_AVAILABLE;
      height: number;
    };
