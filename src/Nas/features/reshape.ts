import type OperationNode from "../OperationNode.js";
import { CHANNEL_DIM, type Shape } from "../NasTypes.js";
import { InvalidReshapeError } from "../Errors.js";
import { formatShape, isInteger, normalizeDim, product } from "../Utils.js";

export interface ReshapeEffect {
    // whether spatial positions end up in the channel dimension
    altersChannels: boolean;
    multiplier: number;
}

const KEEPS_CHANNELS: ReshapeEffect = { altersChannels: false, multiplier: 1 };

function dimArg(
    node: OperationNode.Class,
    position: number,
    name: string,
    fallback: number | undefined,
    rank: number,
): number | undefined {
    const value = node.tryGetArg(position, name);
    if (value === undefined) return fallback;
    if (!isInteger(value)) {
        throw new InvalidReshapeError(`${node.id}: '${name}' must be an integer, got ${JSON.stringify(value)}`);
    }
    const dim = normalizeDim(value, rank);
    if (dim === undefined) {
        throw new InvalidReshapeError(`${node.id}: '${name}'=${value} is out of range for a rank-${rank} input`);
    }
    return dim;
}

/**
 * `flatten(x, start_dim=0, end_dim=-1)` applied to an input of shape
 * `inputShape`. Merging dims [start, end] multiplies the channels by the
 * extents of the spatial dims folded into them when the range starts at the
 * channel dimension.
 */
export function flattenEffect(node: OperationNode.Class, inputShape: Shape): ReshapeEffect {
    const rank = inputShape.length;
    const start = dimArg(node, 0, "start_dim", 0, rank) ?? 0;
    const end = dimArg(node, 1, "end_dim", rank - 1, rank) ?? rank - 1;

    if (start === 0) {
        throw new InvalidReshapeError(`${node.id}: flattening the batch dimension is not supported`);
    }
    if (start > end) {
        throw new InvalidReshapeError(`${node.id}: start_dim ${start} is after end_dim ${end}`);
    }
    if (start !== CHANNEL_DIM) return KEEPS_CHANNELS;

    return {
        altersChannels: true,
        multiplier: product(inputShape.slice(CHANNEL_DIM + 1, end + 1)),
    };
}

/**
 * `squeeze(x, dim)`. Squeezing the (unit) channel dimension slides dim 2 into
 * the channel position.
 */
export function squeezeEffect(node: OperationNode.Class, inputShape: Shape): ReshapeEffect {
    const rank = inputShape.length;
    const dim = dimArg(node, 0, "dim", undefined, rank);

    if (dim === undefined) {
        throw new InvalidReshapeError(`${node.id}: squeeze without 'dim' is not supported`);
    }
    if (dim === 0) {
        throw new InvalidReshapeError(`${node.id}: squeezing the batch dimension is not supported`);
    }
    if (dim !== CHANNEL_DIM) return KEEPS_CHANNELS;

    const next = inputShape[CHANNEL_DIM + 1];
    if (next === undefined) {
        throw new InvalidReshapeError(
            `${node.id}: cannot squeeze the channels of an input of shape ${formatShape(inputShape)}`,
        );
    }
    return { altersChannels: true, multiplier: next };
}
