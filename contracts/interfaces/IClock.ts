/** Source of the current time in whole unix seconds. */
export interface IClock {
  now(): number;
}

export const systemClock: IClock = {
  now: () => Math.floor(Date.now() / 1000),
};
