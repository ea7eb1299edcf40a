import { Type } from "@sinclair/typebox";

export const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

/** Non-negative integer amount as a decimal string (bigint on the wire). */
export const AmountString = Type.String({ pattern: "^[0-9]{1,78}$" });
