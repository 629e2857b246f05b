/**
 * Lazily evaluated channel counts.
 *
 * A calculator only references other calculators, never graph nodes, so a
 * value is resolved from its inputs without walking the graph again. Search
 * methods plug their own subclasses in (e.g. one reading a learned mask) and
 * every calculator built on top of them follows automatically.
 */
export default abstract class FeaturesCalculator {
    abstract readonly kind: string;

    /** Number of active output channels */
    abstract get features(): number;

    /** Calculators this one is derived from */
    abstract get inputs(): FeaturesCalculator[];

    abstract describe(): string;
}

export class ConstFeaturesCalculator extends FeaturesCalculator {
    readonly kind = "const";

    constructor(private readonly constFeatures: number) {
        super();
    }

    get features(): number {
        return this.constFeatures;
    }

    get inputs(): FeaturesCalculator[] {
        return [];
    }

    describe(): string {
        return `Const(${this.constFeatures})`;
    }
}

export class PassthroughFeaturesCalculator extends FeaturesCalculator {
    readonly kind = "passthrough";

    constructor(readonly upstream: FeaturesCalculator) {
        super();
    }

    get features(): number {
        return this.upstream.features;
    }

    get inputs(): FeaturesCalculator[] {
        return [this.upstream];
    }

    describe(): string {
        return `Passthrough(${this.upstream.describe()})`;
    }
}

// channels folded with spatial positions, e.g. by a flatten
export class FlattenFeaturesCalculator extends FeaturesCalculator {
    readonly kind = "flatten";

    constructor(
        readonly upstream: FeaturesCalculator,
        readonly multiplier: number,
    ) {
        super();
    }

    get features(): number {
        return this.upstream.features * this.multiplier;
    }

    get inputs(): FeaturesCalculator[] {
        return [this.upstream];
    }

    describe(): string {
        return `Flatten(${this.upstream.describe()} * ${this.multiplier})`;
    }
}

export class ConcatFeaturesCalculator extends FeaturesCalculator {
    readonly kind = "concat";

    constructor(readonly upstreams: FeaturesCalculator[]) {
        super();
    }

    get features(): number {
        return this.upstreams.reduce((sum, calculator) => sum + calculator.features, 0);
    }

    get inputs(): FeaturesCalculator[] {
        return [...this.upstreams];
    }

    describe(): string {
        return `Concat(${this.upstreams.map(c => c.describe()).join(", ")})`;
    }
}
