import { clsx } from "clsx";

export type BadgeVariant = "persona" | "unknown";

export function badge({ variant = "persona" }: { variant?: BadgeVariant } = {}) {
  return clsx(
    "inline-flex items-center rounded-lg px-2 py-1 text-xs font-medium text-white",
    variant === "persona" ? "shadow" : "bg-slate-500"
  );
}
