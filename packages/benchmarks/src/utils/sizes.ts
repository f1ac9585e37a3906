/**
 * Common named shapes for benchmarking
 */

export interface BenchmarkSize {
  name: string;
  shape: Readonly<Record<string, number>>;
  elements: number;
}

export const VECTOR_SIZES: BenchmarkSize[] = [
  { name: 'tiny', shape: { x: 10 }, elements: 10 },
  { name: 'small', shape: { x: 100 }, elements: 100 },
  { name: 'medium', shape: { x: 1000 }, elements: 1000 },
  { name: 'large', shape: { x: 10000 }, elements: 10000 },
];

export const GRID_SIZES: BenchmarkSize[] = [
  { name: 'tiny', shape: { x: 10, y: 10 }, elements: 100 },
  { name: 'small', shape: { x: 32, y: 32 }, elements: 1024 },
  { name: 'medium', shape: { x: 100, y: 100 }, elements: 10000 },
  { name: 'large', shape: { x: 256, y: 256 }, elements: 65536 },
];

export function formatNamedShape(shape: Readonly<Record<string, number>>): string {
  return Object.entries(shape)
    .map(([name, extent]) => `${name}=${extent}`)
    .join('×');
}

export function formatSize(size: BenchmarkSize): string {
  return `${size.name} ${formatNamedShape(size.shape)} (${size.elements.toLocaleString('en-US')} elements)`;
}
