// Binary mask helpers. Masks are row-major, 1 = matched pixel, 0 = background.

/**
 * Sets every background pixel that no 4-connected background path links to
 * the mask border, so outlined or anti-aliased strokes come out solid.
 */
export function fillEnclosedHoles(mask: Uint8Array, w: number, h: number): Uint8Array {
  const outside = new Uint8Array(w * h);
  const stack: number[] = [];

  const seed = (x: number, y: number) => {
    const idx = y * w + x;
    if (!mask[idx] && !outside[idx]) {
      outside[idx] = 1;
      stack.push(idx);
    }
  };

  for (let x = 0; x < w; x++) {
    seed(x, 0);
    seed(x, h - 1);
  }
  for (let y = 0; y < h; y++) {
    seed(0, y);
    seed(w - 1, y);
  }

  let idx = stack.pop();
  while (idx !== undefined) {
    const x = idx % w;
    const y = Math.floor(idx / w);
    if (x > 0) seed(x - 1, y);
    if (x < w - 1) seed(x + 1, y);
    if (y > 0) seed(x, y - 1);
    if (y < h - 1) seed(x, y + 1);
    idx = stack.pop();
  }

  const out = new Uint8Array(w * h);
  for (let i = 0; i < w * h; i++) out[i] = outside[i] ? 0 : 1;
  return out;
}

/**
 * Morphological closing with a square structuring element of side
 * `2 * radius + 1`. The dilation runs on a canvas padded by `radius`, so
 * pixels near the mask edge are not eroded away and nothing grows past it.
 */
export function closeMask(mask: Uint8Array, w: number, h: number, radius: number = 2): Uint8Array {
  const pw = w + 2 * radius;
  const ph = h + 2 * radius;
  const dilated = new Uint8Array(pw * ph);

  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      if (!mask[y * w + x]) continue;
      // Pixel (x, y) sits at (x + radius, y + radius) on the padded canvas
      for (let dy = 0; dy <= 2 * radius; dy++) {
        const row = (y + dy) * pw;
        for (let dx = 0; dx <= 2 * radius; dx++) dilated[row + x + dx] = 1;
      }
    }
  }

  const out = new Uint8Array(w * h);
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      let keep = 1;
      for (let dy = 0; dy <= 2 * radius && keep; dy++) {
        const row = (y + dy) * pw;
        for (let dx = 0; dx <= 2 * radius; dx++) {
          if (!dilated[row + x + dx]) {
            keep = 0;
            break;
          }
        }
      }
      out[y * w + x] = keep;
    }
  }
  return out;
}

// Hole fill followed by a 5x5 closing
export function cleanMask(mask: Uint8Array, w: number, h: number): Uint8Array {
  if (w <= 0 || h <= 0) return mask.slice();
  return closeMask(fillEnclosedHoles(mask, w, h), w, h, 2);
}
