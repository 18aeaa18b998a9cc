export type Clock = {
  now: () => Date;
};

export const systemClock: Clock = {
  now: () => new Date(),
};

export function elapsedMs(clock: Clock, startedAt: Date): number {
  return Math.max(0, clock.now().getTime() - startedAt.getTime());
}
