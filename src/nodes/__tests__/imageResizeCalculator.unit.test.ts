import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  DEFAULT_PIXEL_BUDGET,
  executeResizeCalculator,
  IMAGE_RESIZE_CALCULATOR_ID,
  imageResizeCalculatorNode,
  MAX_EDGE,
  MAX_PIXEL_BUDGET,
  resizeCalculatorCacheKey,
} from '@/nodes/imageResizeCalculator.js';
import type { SizingDiagnostic } from '@/sizing/types.js';

void describe('imageResizeCalculatorNode', () => {
  void describe('declared interface', () => {
    void it('declares width and height as 1..65536 defaulting to 1024', () => {
      for (const name of ['width', 'height'] as const) {
        const spec = imageResizeCalculatorNode.inputs[name];
        assert.equal(spec.type, 'INT');
        assert.equal(spec.min, 1);
        assert.equal(spec.max, MAX_EDGE);
        assert.equal(spec.default, 1024);
        assert.equal(spec.step, 1);
      }
    });

    void it('declares the pixel budget as 1..16777216 defaulting to 1048576', () => {
      const spec = imageResizeCalculatorNode.inputs.num_pixels;

      assert.equal(spec.min, 1);
      assert.equal(spec.max, MAX_PIXEL_BUDGET);
      assert.equal(spec.default, DEFAULT_PIXEL_BUDGET);
      assert.equal(MAX_PIXEL_BUDGET, 4096 * 4096);
      assert.equal(DEFAULT_PIXEL_BUDGET, 1024 * 1024);
    });

    void it('declares outputs in host order', () => {
      assert.deepEqual(
        imageResizeCalculatorNode.outputs.map((output) => output.name),
        ['width_max', 'height_max']
      );
    });

    void it('uses a stable id and the image category', () => {
      assert.equal(imageResizeCalculatorNode.id, IMAGE_RESIZE_CALCULATOR_ID);
      assert.equal(imageResizeCalculatorNode.category, 'image');
    });
  });

  void describe('cacheKey', () => {
    void it('joins the inputs with underscores', () => {
      assert.equal(
        imageResizeCalculatorNode.cacheKey({ width: 1920, height: 1080, num_pixels: 1048576 }),
        '1920_1080_1048576'
      );
    });

    void it('gives equal keys for equal inputs and different keys otherwise', () => {
      const key = resizeCalculatorCacheKey({ width: 640, height: 480, num_pixels: 1000 });

      assert.equal(resizeCalculatorCacheKey({ width: 640, height: 480, num_pixels: 1000 }), key);
      assert.notEqual(resizeCalculatorCacheKey({ width: 480, height: 640, num_pixels: 1000 }), key);
    });
  });

  void describe('execute', () => {
    void it('returns host-shaped outputs', () => {
      assert.deepEqual(
        imageResizeCalculatorNode.execute({ width: 1920, height: 1080, num_pixels: 1048576 }),
        { width_max: 1365, height_max: 768 }
      );
    });

    void it('passes the original through when it fits', () => {
      assert.deepEqual(
        imageResizeCalculatorNode.execute({ width: 800, height: 600, num_pixels: 1000000 }),
        { width_max: 800, height_max: 600 }
      );
    });

    void it('degrades to 1x1 instead of throwing on invalid input', () => {
      const diagnostics: SizingDiagnostic[] = [];

      const outputs = executeResizeCalculator(
        { width: 100, height: -5, num_pixels: 1000 },
        { onDiagnostic: (diagnostic) => diagnostics.push(diagnostic) }
      );

      assert.deepEqual(outputs, { width_max: 1, height_max: 1 });
      assert.equal(diagnostics.length, 1);
      assert.equal(diagnostics.at(0)?.type, 'error');
    });
  });
});
