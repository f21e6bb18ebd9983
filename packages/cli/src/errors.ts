import { MoiraError } from "@moira/core";

/** Bad command line or environment: unknown command, missing operand, invalid option value. */
export class UsageError extends MoiraError {}
