// Type declarations for the parts of jstat used here

declare module 'jstat' {
  export interface jStat {
    normal: {
      pdf(x: number, mean: number, std: number): number;
      cdf(x: number, mean: number, std: number): number;
      inv(p: number, mean: number, std: number): number;
    };
  }

  const jStat: jStat;
  export default jStat;
}
