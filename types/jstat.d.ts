declare module "jstat" {
  interface JStatNormal {
    sample(mean: number, std: number): number;
  }

  interface JStatStatic {
    normal: JStatNormal;
    setRandom(fn: () => number): void;
  }

  const jStat: JStatStatic;
  export default jStat;
}
