/**
 * Windowing and real-input magnitude spectrum.
 *
 * Power-of-two block sizes go through an iterative Cooley-Tukey radix-2 FFT;
 * any other size falls back to a direct DFT over the non-negative bins.
 */

/**
 * Symmetric Hann window: w[n] = 0.5 − 0.5·cos(2πn / (N − 1)).
 * A single-sample window is [1].
 */
export function hannWindow(size: number): Float64Array {
  const w = new Float64Array(size);
  if (size === 1) {
    w[0] = 1;
    return w;
  }
  for (let n = 0; n < size; n++) {
    w[n] = 0.5 - 0.5 * Math.cos((2 * Math.PI * n) / (size - 1));
  }
  return w;
}

export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

/**
 * Computes the amplitude-normalised magnitude spectrum of a windowed real signal.
 *
 * Bin k holds |X[k]| · 2 / Σw, so a sine of peak amplitude A centred on a bin
 * reads A. The result has floor(N/2) + 1 bins spanning 0..fs/2.
 *
 * @param samples - Time-domain block
 * @param window - Window of the same length (see hannWindow)
 */
export function magnitudeSpectrum(samples: ArrayLike<number>, window: Float64Array): Float64Array {
  const n = samples.length;
  if (window.length !== n) {
    throw new RangeError(`window length ${window.length} does not match block length ${n}`);
  }

  const numBins = Math.floor(n / 2) + 1;
  const re = new Float64Array(n);
  const im = new Float64Array(n);
  let windowSum = 0;
  for (let i = 0; i < n; i++) {
    re[i] = samples[i] * window[i];
    windowSum += window[i];
  }

  if (isPowerOfTwo(n)) {
    radix2FFT(re, im, n);
  } else {
    directDFT(re, im, numBins);
  }

  const scale = windowSum > 0 ? 2 / windowSum : 0;
  const mags = new Float64Array(numBins);
  for (let k = 0; k < numBins; k++) {
    mags[k] = Math.sqrt(re[k] * re[k] + im[k] * im[k]) * scale;
  }
  return mags;
}

/**
 * Iterative Cooley-Tukey radix-2 in-place FFT. Output is unscaled;
 * magnitudeSpectrum applies the 2/Σw amplitude normalisation afterwards.
 * @param re - Windowed samples in, real part out; length a power of 2
 * @param im - Zeros in, imaginary part out
 * @param n  - FFT size
 */
function radix2FFT(re: Float64Array, im: Float64Array, n: number): void {
  // Bit-reversal permutation
  let j = 0;
  for (let i = 1; i < n; i++) {
    let bit = n >> 1;
    for (; j & bit; bit >>= 1) j ^= bit;
    j ^= bit;
    if (i < j) {
      let tmp = re[i]; re[i] = re[j]; re[j] = tmp;
      tmp = im[i]; im[i] = im[j]; im[j] = tmp;
    }
  }

  // Butterfly stages
  for (let len = 2; len <= n; len <<= 1) {
    const half = len >> 1;
    const ang = (-2 * Math.PI) / len;
    const wRe = Math.cos(ang);
    const wIm = Math.sin(ang);
    for (let i = 0; i < n; i += len) {
      let curRe = 1.0;
      let curIm = 0.0;
      for (let k = 0; k < half; k++) {
        const uRe = re[i + k];
        const uIm = im[i + k];
        const vRe = re[i + k + half] * curRe - im[i + k + half] * curIm;
        const vIm = re[i + k + half] * curIm + im[i + k + half] * curRe;
        re[i + k] = uRe + vRe;
        im[i + k] = uIm + vIm;
        re[i + k + half] = uRe - vRe;
        im[i + k + half] = uIm - vIm;
        const nextRe = curRe * wRe - curIm * wIm;
        curIm = curRe * wIm + curIm * wRe;
        curRe = nextRe;
      }
    }
  }
}

/**
 * Direct DFT of a real signal held in `re`, writing bins 0..numBins-1 back
 * into `re`/`im`. O(N²); only used for non power-of-two sizes.
 */
function directDFT(re: Float64Array, im: Float64Array, numBins: number): void {
  const n = re.length;
  const input = re.slice();
  for (let k = 0; k < numBins; k++) {
    let sumRe = 0;
    let sumIm = 0;
    for (let t = 0; t < n; t++) {
      // Reduce the phase index first to keep the angle small
      const angle = (-2 * Math.PI * ((k * t) % n)) / n;
      sumRe += input[t] * Math.cos(angle);
      sumIm += input[t] * Math.sin(angle);
    }
    re[k] = sumRe;
    im[k] = sumIm;
  }
}
