/**
 * Pure math helper functions
 * Special functions missing from Math - no side effects, just computation
 */

const TWO_OVER_SQRT_PI = 2 / Math.sqrt(Math.PI);

/** Below this magnitude the Maclaurin series converges quickly */
const SERIES_LIMIT = 2;

/** erf(x) = 2/√π · Σ (-1)ⁿ x²ⁿ⁺¹ / (n! (2n+1)) */
function erfSeries(x: number): number {
  let sum = 0;
  let term = x; // (-1)ⁿ x²ⁿ⁺¹ / n!
  for (let n = 0; n < 100; n++) {
    const contribution = term / (2 * n + 1);
    sum += contribution;
    if (Math.abs(contribution) <= Number.EPSILON * Math.abs(sum)) break;
    term *= (-x * x) / (n + 1);
  }
  return TWO_OVER_SQRT_PI * sum;
}

/**
 * Complementary error function via a Chebyshev fit
 * Fractional error below 1.2e-7 everywhere
 */
function erfcChebyshev(x: number): number {
  const z = Math.abs(x);
  const t = 1 / (1 + 0.5 * z);
  const poly =
    -1.26551223 +
    t *
      (1.00002368 +
        t *
          (0.37409196 +
            t *
              (0.09678418 +
                t *
                  (-0.18628806 +
                    t * (0.27886807 + t * (-1.13520398 + t * (1.48851587 + t * (-0.82215223 + t * 0.17087277))))))));
  const ans = t * Math.exp(-z * z + poly);
  return x >= 0 ? ans : 2 - ans;
}

/** Gauss error function */
export function erf(x: number): number {
  if (Math.abs(x) < SERIES_LIMIT) return erfSeries(x);
  return Math.sign(x) * (1 - erfcChebyshev(Math.abs(x)));
}

/** Complementary error function 1 - erf(x), without cancellation for large x */
export function erfc(x: number): number {
  if (Math.abs(x) < SERIES_LIMIT) return 1 - erfSeries(x);
  return erfcChebyshev(x);
}
