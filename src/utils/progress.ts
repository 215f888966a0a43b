export type StopReason = 'completed' | 'challenge' | 'container-not-found' | 'no-cards';

export type Progress = {
  running: boolean;
  pagesTarget: number;
  currentPage: number;
  pagesVisited: number;
  cardsSeen: number;
  placesCollected: number;
  interventionRequired: boolean;
  stopReason: StopReason | null;
};

const initial = (): Progress => ({
  running: false,
  pagesTarget: 0,
  currentPage: 0,
  pagesVisited: 0,
  cardsSeen: 0,
  placesCollected: 0,
  interventionRequired: false,
  stopReason: null,
});

export class ProgressStore {
  private state: Progress = initial();

  get(): Readonly<Progress> { return this.state; }
  set(p: Partial<Progress>) { this.state = { ...this.state, ...p }; }
  reset() { this.state = initial(); }
}
