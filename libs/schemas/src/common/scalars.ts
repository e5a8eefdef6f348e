import { z } from "zod";

export const NonEmptyStringSchema = z.string().min(1);
export const FiniteNumberSchema = z.number().finite();
export const NonNegativeIntegerSchema = z.number().int().nonnegative();
export const PositiveIntegerSchema = z.number().int().positive();
export const HttpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "Expected an http(s) URL" });
export const HostPortSchema = z
  .string()
  .regex(/^[^\s:]+:\d{1,5}$/, { message: "Expected host:port" })
  .refine((value) => Number(value.slice(value.lastIndexOf(":") + 1)) <= 65535, {
    message: "Port must be between 0 and 65535"
  });
