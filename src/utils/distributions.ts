/**
 * Probability Distributions
 *
 * Normal and Student-t distribution functions used for interval estimates:
 * - Standard normal CDF and quantile (Acklam rational approximation)
 * - Student-t CDF via the regularized incomplete beta function
 * - Student-t quantile by bracketed bisection on the CDF
 *
 * The t quantile is solved to a relative tolerance of 1e-12 for any
 * degrees of freedom.
 */

const SQRT_2PI = Math.sqrt(2 * Math.PI);

/**
 * Natural log of the gamma function
 *
 * Lanczos approximation (g = 7, n = 9).
 */
export function logGamma(z: number): number {
  const g = 7;
  const c = [
    0.99999999999980993,
    676.5203681218851,
    -1259.1392167224028,
    771.32342877765313,
    -176.61502916214059,
    12.507343278686905,
    -0.13857109526572012,
    9.9843695780195716e-6,
    1.5056327351493116e-7,
  ];

  if (z < 0.5) {
    // Reflection formula
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * z))) - logGamma(1 - z);
  }

  const shifted = z - 1;
  let x = c[0];
  for (let i = 1; i < g + 2; i++) {
    x += c[i] / (shifted + i);
  }

  const t = shifted + g + 0.5;
  return Math.log(SQRT_2PI) + (shifted + 0.5) * Math.log(t) - t + Math.log(x);
}

/**
 * Continued fraction for the incomplete beta function (modified Lentz)
 */
function betaContinuedFraction(a: number, b: number, x: number): number {
  const maxIterations = 300;
  const epsilon = 3e-16;
  const tiny = 1e-300;

  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < tiny) d = tiny;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= maxIterations; m++) {
    const m2 = 2 * m;

    // Even step
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    h *= d * c;

    // Odd step
    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    const delta = d * c;
    h *= delta;

    if (Math.abs(delta - 1) < epsilon) {
      break;
    }
  }

  return h;
}

/**
 * Regularized incomplete beta function I_x(a, b)
 */
export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const logFront =
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x);
  const front = Math.exp(logFront);

  // Use the symmetry relation where the continued fraction converges faster
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

/**
 * Student's t-distribution CDF
 *
 * @param t - t-statistic
 * @param df - Degrees of freedom (> 0)
 * @returns Probability P(T ≤ t)
 */
export function studentTCDF(t: number, df: number): number {
  if (df <= 0) {
    throw new RangeError('Degrees of freedom must be positive');
  }
  const x = df / (df + t * t);
  const tail = 0.5 * regularizedIncompleteBeta(x, df / 2, 0.5);
  return t >= 0 ? 1 - tail : tail;
}

/**
 * Student's t-distribution quantile function (inverse CDF)
 *
 * Returns t such that P(T ≤ t) = p.
 *
 * @param p - Probability (0 < p < 1)
 * @param df - Degrees of freedom (> 0)
 */
export function studentTQuantile(p: number, df: number): number {
  if (p <= 0 || p >= 1) {
    throw new RangeError('Probability must be between 0 and 1');
  }
  if (df <= 0) {
    throw new RangeError('Degrees of freedom must be positive');
  }
  if (p === 0.5) {
    return 0;
  }

  // Bracket the root, then bisect; the CDF is monotone so this always converges
  let lower = -1;
  let upper = 1;
  while (studentTCDF(lower, df) > p) lower *= 2;
  while (studentTCDF(upper, df) < p) upper *= 2;

  const maxIterations = 200;
  for (let i = 0; i < maxIterations; i++) {
    const mid = (lower + upper) / 2;
    if (studentTCDF(mid, df) < p) {
      lower = mid;
    } else {
      upper = mid;
    }
    if (upper - lower < 1e-12 * Math.max(1, Math.abs(mid))) {
      break;
    }
  }

  return (lower + upper) / 2;
}

/**
 * Standard normal CDF (cumulative distribution function)
 */
export function normalCDF(x: number): number {
  return 0.5 * erfc(-x / Math.SQRT2);
}

/**
 * Standard normal quantile function (inverse CDF)
 *
 * Rational approximation (Acklam), relative error below 1.2e-9.
 *
 * @param p - Probability (0 < p < 1)
 */
export function normalQuantile(p: number): number {
  if (p <= 0 || p >= 1) {
    throw new RangeError('Probability must be between 0 and 1');
  }

  // Coefficients for rational approximation
  const a = [
    -3.969683028665376e1,
    2.209460984245205e2,
    -2.759285104469687e2,
    1.38357751867269e2,
    -3.066479806614716e1,
    2.506628277459239e0,
  ];

  const b = [
    -5.447609879822406e1,
    1.615858368580409e2,
    -1.556989798598866e2,
    6.680131188771972e1,
    -1.328068155288572e1,
  ];

  const c = [
    -7.784894002430293e-3,
    -3.223964580411365e-1,
    -2.400758277161838e0,
    -2.549732539343734e0,
    4.374664141464968e0,
    2.938163982698783e0,
  ];

  const d = [7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996e0, 3.754408661907416e0];

  const pLow = 0.02425;
  const pHigh = 1 - pLow;

  if (p < pLow) {
    // Lower region
    const q = Math.sqrt(-2 * Math.log(p));
    return (
      (((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
      ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1)
    );
  } else if (p <= pHigh) {
    // Central region
    const q = p - 0.5;
    const r = q * q;
    return (
      ((((((a[0] * r + a[1]) * r + a[2]) * r + a[3]) * r + a[4]) * r + a[5]) * q) /
      (((((b[0] * r + b[1]) * r + b[2]) * r + b[3]) * r + b[4]) * r + 1)
    );
  } else {
    // Upper region
    const q = Math.sqrt(-2 * Math.log(1 - p));
    return (
      -(((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
      ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1)
    );
  }
}

/**
 * Complementary error function
 *
 * Chebyshev fit (Numerical Recipes erfcc), fractional error below 1.2e-7.
 */
function erfc(x: number): number {
  const z = Math.abs(x);
  const t = 1 / (1 + 0.5 * z);
  const r =
    t *
    Math.exp(
      -z * z -
        1.26551223 +
        t *
          (1.00002368 +
            t *
              (0.37409196 +
                t *
                  (0.09678418 +
                    t *
                      (-0.18628806 +
                        t * (0.27886807 + t * (-1.13520398 + t * (1.48851587 + t * (-0.82215223 + t * 0.17087277))))))))
    );
  return x >= 0 ? r : 2 - r;
}
