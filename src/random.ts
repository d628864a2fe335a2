/**
 * Seeded pseudo-random source for the scoring weights.
 *
 * MT19937 with the classic `init_genrand` seeding, 53-bit uniform doubles and
 * the polar Box-Muller normal sampler that caches its second value. With
 * seed 42 the normal stream starts 0.4967141530112327, -0.13826430117118466,
 * 0.6476885381006925, which is the sequence the scoring weights were
 * calibrated against.
 */

const N = 624;
const M = 397;
const MATRIX_A = 0x9908b0df;
const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;

export class MersenneTwister {
  private readonly state = new Uint32Array(N);
  private index = N;
  private cachedGauss: number | null = null;

  constructor(seed: number) {
    let s = seed >>> 0;
    for (let i = 0; i < N; i += 1) {
      this.state[i] = s;
      s = (Math.imul(1812433253, s ^ (s >>> 30)) + i + 1) >>> 0;
    }
  }

  private twist(): void {
    const mt = this.state;
    for (let k = 0; k < N; k += 1) {
      const y = (mt[k] & UPPER_MASK) | (mt[(k + 1) % N] & LOWER_MASK);
      mt[k] = mt[(k + M) % N] ^ (y >>> 1) ^ (y & 1 ? MATRIX_A : 0);
    }
    this.index = 0;
  }

  /**
   * Next tempered 32-bit output as an unsigned integer.
   */
  nextUint32(): number {
    if (this.index >= N) this.twist();

    let y = this.state[this.index];
    this.index += 1;
    y ^= y >>> 11;
    y ^= (y << 7) & 0x9d2c5680;
    y ^= (y << 15) & 0xefc60000;
    y ^= y >>> 18;
    return y >>> 0;
  }

  /**
   * Uniform double in [0, 1) with 53 bits of precision.
   */
  nextDouble(): number {
    const a = this.nextUint32() >>> 5;
    const b = this.nextUint32() >>> 6;
    return (a * 67108864 + b) / 9007199254740992;
  }

  /**
   * Standard normal sample.
   */
  nextGaussian(): number {
    if (this.cachedGauss !== null) {
      const cached = this.cachedGauss;
      this.cachedGauss = null;
      return cached;
    }

    let x1 = 0;
    let x2 = 0;
    let r2 = 0;
    do {
      x1 = 2 * this.nextDouble() - 1;
      x2 = 2 * this.nextDouble() - 1;
      r2 = x1 * x1 + x2 * x2;
    } while (r2 >= 1 || r2 === 0);

    const f = Math.sqrt((-2 * Math.log(r2)) / r2);
    this.cachedGauss = f * x1;
    return f * x2;
  }

  /**
   * `rows x cols` matrix of `N(0, 1) * scale + shift`, filled row by row.
   */
  gaussianMatrix(
    rows: number,
    cols: number,
    scale = 1,
    shift = 0
  ): number[][] {
    const out: number[][] = [];
    for (let r = 0; r < rows; r += 1) {
      const row: number[] = [];
      for (let c = 0; c < cols; c += 1) {
        row.push(this.nextGaussian() * scale + shift);
      }
      out.push(row);
    }
    return out;
  }
}
