/**
 * Running count/sum/sum-of-squares; derived quantities are computed on demand.
 */
export class StatInfo {
  count = 0;
  sum = 0;
  sum2 = 0;

  add(value: number): this {
    this.count++;
    this.sum += value;
    this.sum2 += value * value;
    return this;
  }

  mean(): number {
    return this.sum / this.count;
  }

  /** Population variance, `sum2/count - mean^2`. */
  variance(): number {
    return this.sum2 / this.count - this.mean() ** 2;
  }

  sigma(): number {
    return Math.sqrt(this.variance());
  }
}
