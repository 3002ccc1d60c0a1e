import { JobState } from './JobState';

describe('JobState', () => {
  describe('fromString', () => {
    it('should create from valid string', () => {
      const state = JobState.fromString('running');
      expect(state.value).toBe('running');
    });

    it('should throw for invalid string', () => {
      expect(() => JobState.fromString('completed')).toThrow('Invalid job state');
    });
  });

  describe('isTerminal', () => {
    it.each(['succeeded', 'failed', 'cancelled'])('should return true for %s', (value) => {
      expect(JobState.fromString(value).isTerminal).toBe(true);
    });

    it.each(['pending', 'fetching', 'running', 'storing'])('should return false for %s', (value) => {
      expect(JobState.fromString(value).isTerminal).toBe(false);
    });
  });

  describe('isInFlight', () => {
    it('should be true only while an attempt owns the job', () => {
      expect(JobState.pending().isInFlight).toBe(false);
      expect(JobState.fetching().isInFlight).toBe(true);
      expect(JobState.running().isInFlight).toBe(true);
      expect(JobState.storing().isInFlight).toBe(true);
      expect(JobState.succeeded().isInFlight).toBe(false);
    });
  });

  describe('canTransitionTo', () => {
    it('should allow the forward path of an attempt', () => {
      expect(JobState.pending().canTransitionTo(JobState.fetching())).toBe(true);
      expect(JobState.fetching().canTransitionTo(JobState.running())).toBe(true);
      expect(JobState.running().canTransitionTo(JobState.storing())).toBe(true);
      expect(JobState.storing().canTransitionTo(JobState.succeeded())).toBe(true);
    });

    it('should allow fetching -> pending for a retry', () => {
      expect(JobState.fetching().canTransitionTo(JobState.pending())).toBe(true);
    });

    it('should allow cancel from every non-terminal state', () => {
      for (const state of [JobState.pending(), JobState.fetching(), JobState.running(), JobState.storing()]) {
        expect(state.canTransitionTo(JobState.cancelled())).toBe(true);
      }
    });

    it('should not allow skipping steps', () => {
      expect(JobState.pending().canTransitionTo(JobState.running())).toBe(false);
      expect(JobState.fetching().canTransitionTo(JobState.storing())).toBe(false);
      expect(JobState.running().canTransitionTo(JobState.succeeded())).toBe(false);
    });

    it('should not allow pending -> failed', () => {
      expect(JobState.pending().canTransitionTo(JobState.failed())).toBe(false);
    });

    it('should not allow leaving a terminal state', () => {
      expect(JobState.succeeded().canTransitionTo(JobState.pending())).toBe(false);
      expect(JobState.failed().canTransitionTo(JobState.fetching())).toBe(false);
      expect(JobState.cancelled().canTransitionTo(JobState.cancelled())).toBe(false);
    });
  });

  describe('equals', () => {
    it('should compare by value', () => {
      expect(JobState.running().equals(JobState.fromString('running'))).toBe(true);
      expect(JobState.running().equals(JobState.storing())).toBe(false);
    });
  });
});
