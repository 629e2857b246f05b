import type { ArgValue, Shape } from "./NasTypes.js";

export function product(values: number[]): number {
    return values.reduce((a, b) => a * b, 1);
}

export function isInteger(value: ArgValue | undefined): value is number {
    return typeof value === "number" && Number.isInteger(value);
}

/* maps a possibly negative axis into [0, rank); undefined when out of range */
export function normalizeDim(dim: number, rank: number): number | undefined {
    const normalized = dim < 0 ? dim + rank : dim;
    if (normalized < 0 || normalized >= rank) return undefined;
    return normalized;
}

export function formatShape(shape: Shape | undefined): string {
    return shape ? `(${shape.join(", ")})` : "(?)";
}
