/**
 * Contract tests for the nodes command group.
 */

import assert from 'node:assert';
import { describe, test } from 'node:test';

import {
  buildNodesListResult,
  describeNode,
  resolveNodeDescription,
} from '@/commands/nodes/index.js';
import { imageResizeCalculatorNode } from '@/nodes/imageResizeCalculator.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

describe('nodes command contract', () => {
  test('list returns id, display name and category of every node', () => {
    assert.deepStrictEqual(buildNodesListResult(), {
      nodes: [
        {
          id: 'ImageResizeCalculator',
          displayName: 'Image Resize Calculator',
          category: 'image',
        },
      ],
    });
  });

  test('describe drops the executable parts of a node', () => {
    const description = describeNode(imageResizeCalculatorNode);

    assert.deepStrictEqual(Object.keys(description), [
      'id',
      'displayName',
      'category',
      'description',
      'inputs',
      'outputs',
    ]);
    assert.deepStrictEqual(Object.keys(description.inputs), ['width', 'height', 'num_pixels']);
  });

  test('describe output survives a JSON round trip unchanged', () => {
    const description = resolveNodeDescription('ImageResizeCalculator');

    assert.deepStrictEqual(JSON.parse(JSON.stringify(description)), description);
  });

  test('unknown id suggests the closest node', () => {
    assert.throws(
      () => resolveNodeDescription('ImageResizeCalculater'),
      (error: unknown) =>
        error instanceof CommandError &&
        error.exitCode === EXIT_CODES.RESOURCE_NOT_FOUND &&
        error.message === 'Unknown node: "ImageResizeCalculater"' &&
        error.metadata.suggestion === 'Did you mean: ImageResizeCalculator?'
    );
  });

  test('id typed in the wrong case suggests the registered spelling', () => {
    assert.throws(
      () => resolveNodeDescription('imageresizecalculator'),
      (error: unknown) =>
        error instanceof CommandError &&
        error.metadata.suggestion === 'Did you mean: ImageResizeCalculator?'
    );
  });

  test('unknown id with nothing close lists the available nodes', () => {
    assert.throws(
      () => resolveNodeDescription('StringSplit'),
      (error: unknown) =>
        error instanceof CommandError &&
        error.metadata.suggestion === 'Available nodes: ImageResizeCalculator'
    );
  });
});
