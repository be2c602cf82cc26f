/**
 * Shared wire primitives.
 */

import { Type } from "@sinclair/typebox";
import { MAX_LOCK_EPOCHS, U32_MAX } from "../constants.js";

/** Account identifier as carried in the `x-account` header and in bodies. */
export const AccountId = Type.String({ minLength: 1, maxLength: 128, pattern: "^[A-Za-z0-9_.:-]+$" });

/** Lock units (u32). */
export const LockUnits = Type.Integer({ minimum: 1, maximum: U32_MAX });

export const LockEpochs = Type.Integer({ minimum: 1, maximum: MAX_LOCK_EPOCHS });

export const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

/** Raw token amounts travel as decimal strings. */
export const TokenAmount = Type.String({ pattern: "^[0-9]{1,39}$" });
