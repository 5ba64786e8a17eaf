/** Round half away from zero to `scale` decimal places, the way a DECIMAL column stores it. */
export function roundTo(value: number, scale: number): number {
  const factor = 10 ** scale;
  const rounded = Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
  // avoid -0
  return rounded === 0 ? 0 : rounded;
}

