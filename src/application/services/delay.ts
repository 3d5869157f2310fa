export type Delay = (ms: number) => Promise<void>;

export const sleep: Delay = ms => new Promise(resolve => setTimeout(resolve, ms));
