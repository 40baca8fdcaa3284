/**
 * Shared types for the simulation views
 */

export type SimulationMode = 'spinners' | 'chorus';
