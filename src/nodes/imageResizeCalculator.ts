/**
 * Image Resize Calculator node.
 *
 * Wraps calculateMaxSize for the node-graph host: three integer inputs,
 * two integer outputs, and a cache key built from the inputs.
 */

import type { NodeDefinition } from '@/nodes/types.js';
import { calculateMaxSize } from '@/sizing/maxSize.js';
import type { CalculateOptions } from '@/sizing/types.js';

export const IMAGE_RESIZE_CALCULATOR_ID = 'ImageResizeCalculator';

/** 65536 is the largest edge the host accepts */
export const MAX_EDGE = 65536;

/** 4096 * 4096 */
export const MAX_PIXEL_BUDGET = 16777216;

/** 1024 * 1024 */
export const DEFAULT_PIXEL_BUDGET = 1048576;

export type ResizeCalculatorInputs = {
  width: number;
  height: number;
  num_pixels: number;
};

export type ResizeCalculatorOutputs = {
  width_max: number;
  height_max: number;
};

/**
 * Build the cache key for a set of inputs.
 *
 * @param inputs - Node inputs
 * @returns Underscore-joined input values (e.g., '1920_1080_1048576')
 */
export function resizeCalculatorCacheKey(inputs: ResizeCalculatorInputs): string {
  return `${inputs.width}_${inputs.height}_${inputs.num_pixels}`;
}

/**
 * Run the calculator with host-shaped inputs and outputs.
 *
 * @param inputs - Node inputs
 * @param options - Optional diagnostic callback passed to the calculator
 */
export function executeResizeCalculator(
  inputs: ResizeCalculatorInputs,
  options: CalculateOptions = {}
): ResizeCalculatorOutputs {
  const { width, height } = calculateMaxSize(
    inputs.width,
    inputs.height,
    inputs.num_pixels,
    options
  );
  return { width_max: width, height_max: height };
}

export const imageResizeCalculatorNode: NodeDefinition<
  ResizeCalculatorInputs,
  ResizeCalculatorOutputs
> = {
  id: IMAGE_RESIZE_CALCULATOR_ID,
  displayName: 'Image Resize Calculator',
  category: 'image',
  description:
    'Largest integer width/height that keeps the aspect ratio and fits within a pixel budget',
  inputs: {
    width: {
      type: 'INT',
      default: 1024,
      min: 1,
      max: MAX_EDGE,
      step: 1,
      tooltip: 'Original image width',
    },
    height: {
      type: 'INT',
      default: 1024,
      min: 1,
      max: MAX_EDGE,
      step: 1,
      tooltip: 'Original image height',
    },
    num_pixels: {
      type: 'INT',
      default: DEFAULT_PIXEL_BUDGET,
      min: 1,
      max: MAX_PIXEL_BUDGET,
      step: 1,
      tooltip: 'Target maximum total pixels (width_max * height_max <= num_pixels)',
    },
  },
  outputs: [
    { name: 'width_max', type: 'INT' },
    { name: 'height_max', type: 'INT' },
  ],
  cacheKey: resizeCalculatorCacheKey,
  execute: (inputs) => executeResizeCalculator(inputs),
};
