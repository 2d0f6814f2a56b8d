/**
 * 📈 F 分佈
 *
 * 對數 Gamma (Lanczos, g = 7)、正則化不完全 Beta 函數 (Lentz 連分式)
 * 以及由其導出的 F 分佈函數與分位數
 */

const LANCZOS_COEFFICIENTS = [
  0.99999999999980993,
  676.5203681218851,
  -1259.1392167224028,
  771.32342877765313,
  -176.61502916214059,
  12.507343278686905,
  -0.13857109526572012,
  9.9843695780195716e-6,
  1.5056327351493116e-7
];

const CONTINUED_FRACTION_MAX_TERMS = 300;
const CONTINUED_FRACTION_EPSILON = 3e-16;
const FLOOR = 1e-300;

/**
 * ln Γ(x)，x > 0
 */
export function logGamma(x: number): number {
  if (x < 0.5) {
    // 反射公式
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * x))) - logGamma(1 - x);
  }

  const z = x - 1;
  let series = LANCZOS_COEFFICIENTS[0];
  for (let i = 1; i < LANCZOS_COEFFICIENTS.length; i++) {
    series += LANCZOS_COEFFICIENTS[i] / (z + i);
  }
  const t = z + 7.5;

  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(series);
}

function betaContinuedFraction(a: number, b: number, x: number): number {
  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  const clamp = (value: number): number => (Math.abs(value) < FLOOR ? FLOOR : value);

  let c = 1;
  let d = 1 / clamp(1 - (qab * x) / qap);
  let h = d;

  for (let m = 1; m <= CONTINUED_FRACTION_MAX_TERMS; m++) {
    const m2 = 2 * m;

    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 / clamp(1 + aa * d);
    c = clamp(1 + aa / c);
    h *= d * c;

    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 / clamp(1 + aa * d);
    c = clamp(1 + aa / c);
    const delta = d * c;
    h *= delta;

    if (Math.abs(delta - 1) < CONTINUED_FRACTION_EPSILON) {
      break;
    }
  }

  return h;
}

/**
 * 正則化不完全 Beta 函數 I_x(a, b)
 */
export function regularizedBeta(x: number, a: number, b: number): number {
  if (!(a > 0) || !(b > 0)) {
    throw new Error(`Beta 參數必須為正數: a=${a}, b=${b}`);
  }
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const front = Math.exp(
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x)
  );

  // 連分式在 x < (a+1)/(a+b+2) 時收斂較快，否則使用對稱關係
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

/**
 * F(df1, df2) 分佈函數 P(X ≤ f)
 */
export function fCdf(f: number, df1: number, df2: number): number {
  if (!(df1 > 0) || !(df2 > 0)) {
    throw new Error(`自由度必須為正數: df1=${df1}, df2=${df2}`);
  }
  if (f <= 0) return 0;
  if (f === Number.POSITIVE_INFINITY) return 1;

  return regularizedBeta((df1 * f) / (df1 * f + df2), df1 / 2, df2 / 2);
}

/**
 * F(df1, df2) 分佈的 p 分位數
 *
 * 先倍增上界將分位數括住，再二分至相對寬度 1e-12
 */
export function fQuantile(p: number, df1: number, df2: number): number {
  if (!(p >= 0 && p <= 1)) {
    throw new Error(`機率必須位於 [0, 1]: ${p}`);
  }
  if (p === 0) return 0;
  if (p === 1) return Number.POSITIVE_INFINITY;

  let lo = 0;
  let hi = 1;
  while (fCdf(hi, df1, df2) < p) {
    lo = hi;
    hi *= 2;
  }

  for (let i = 0; i < 200; i++) {
    const mid = (lo + hi) / 2;
    if (fCdf(mid, df1, df2) < p) {
      lo = mid;
    } else {
      hi = mid;
    }
    if (hi - lo <= 1e-12 * Math.max(1, hi)) {
      break;
    }
  }

  return (lo + hi) / 2;
}
