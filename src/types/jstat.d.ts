// Type declarations for the parts of jstat used by iidkit
// jstat ships without typings

declare module 'jstat' {
  export interface JStatStatic {
    gammaln(x: number): number;
  }

  const jStat: JStatStatic;
  export default jStat;
}
