export { VectorClock, type ClockOrdering, type VectorClockState } from './vector-clock.js';
