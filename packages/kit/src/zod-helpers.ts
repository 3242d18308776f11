import type { z } from "zod";

/** Render a zod issue path the way it reads in the JSON: `baseline_curve.torque_nm[2]`. */
export function formatZodPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, "");
}

export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => {
    const path = formatZodPath(i.path);
    return path ? `${path}: ${i.message}` : i.message;
  });
}
