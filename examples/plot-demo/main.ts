import { parseArgs } from 'node:util';
import { createCurve, createHLine, createPlotBuilder, paintToSvg, renderPlot } from '../../src/index';
import type { PointerState, Value } from '../../src/index';

/**
 * Plot demo - a circle and an animated Lissajous figure, printed as SVG.
 *
 *   npm run demo -- --time 1.5 --hover 220,130 > plot.svg
 *
 * `--time` is the animation phase in seconds (the caller's clock, not the plot's).
 * `--hover x,y` simulates a pointer over the plot in screen coordinates.
 */

const TAU = Math.PI * 2;

const remap = (i: number, n: number, to: number): number => (i / n) * to;

const parsePointer = (raw: string | undefined): PointerState => {
  if (raw === undefined) return { hovered: false, pos: null };
  const [x, y] = raw.split(',').map(Number);
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new Error(`--hover expects "x,y" in screen coordinates. Received: ${raw}`);
  }
  return { hovered: true, pos: { x, y } };
};

function main(): void {
  const { values } = parseArgs({
    options: {
      time: { type: 'string', default: '0' },
      hover: { type: 'string' },
      size: { type: 'string', default: '512' },
    },
  });

  const time = Number(values.time);
  const size = Number(values.size);
  if (!Number.isFinite(time) || !Number.isFinite(size) || size <= 0) {
    throw new Error('--time must be a number and --size a positive number.');
  }

  const circlePoints: Value[] = [];
  const circleN = 500;
  for (let i = 0; i <= circleN; i++) {
    const t = remap(i, circleN, TAU);
    const r = 0.5;
    circlePoints.push({ x: r * Math.cos(t), y: r * Math.sin(t) });
  }
  const circle = createCurve(circlePoints, { color: 'rgb(100,240,100)', name: 'circle' });

  const lissajousPoints: Value[] = [];
  const lissajousN = 5000;
  for (let i = 0; i <= lissajousN; i++) {
    const t = remap(i, lissajousN, TAU);
    lissajousPoints.push({ x: Math.sin(4 * t + time), y: Math.sin(6 * t) });
  }
  const lissajous = createCurve(lissajousPoints, { color: 'rgb(100,150,250)', name: 'x=sin(4t), y=sin(6t)' });

  const options = createPlotBuilder()
    .curve(circle)
    .curve(lissajous)
    .hline(createHLine(0, { color: 'rgba(255,255,255,0.2)' }))
    .aspectRatio(1)
    .build();

  const frame = renderPlot(
    options,
    { left: 0, top: 0, right: size, bottom: size },
    parsePointer(values.hover)
  );

  process.stdout.write(`${paintToSvg(frame.commands, { size: { width: size, height: size } })}\n`);
  if (frame.hover) {
    process.stderr.write(`${frame.hover.label}\n`);
  }
}

try {
  main();
} catch (error) {
  console.error('Plot demo failed:', error);
  process.exitCode = 1;
}
