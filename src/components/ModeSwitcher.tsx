/**
 * ModeSwitcher - Overlay component to switch between simulation modes
 * Positioned in top-right corner, matching control panel styling
 */

import type { SimulationMode } from '../shared/types';

interface ModeSwitcherProps {
  mode: SimulationMode;
  onModeChange: (mode: SimulationMode) => void;
}

const MODES: { id: SimulationMode; label: string }[] = [
  { id: 'spinners', label: 'Spinners' },
  { id: 'chorus', label: 'Lobe Chorus' },
];

const styles = {
  container: {
    position: 'absolute' as const,
    top: 16,
    right: 16,
    zIndex: 20,
    backgroundColor: 'rgba(20, 30, 45, 0.7)',
    borderRadius: 16,
    padding: 12,
    display: 'flex',
    gap: 8,
    backdropFilter: 'blur(8px)',
  },
  button: {
    padding: '8px 16px',
    borderRadius: 12,
    border: 'none',
    cursor: 'pointer',
    fontSize: 13,
    fontWeight: 500,
    fontFamily: 'system-ui, sans-serif',
    transition: 'all 0.2s ease',
  },
  buttonActive: {
    backgroundColor: 'hsla(0, 0%, 100%, 0.2)',
    color: 'hsla(0, 0%, 100%, 0.85)',
  },
  buttonInactive: {
    backgroundColor: 'hsla(0, 0%, 100%, 0.08)',
    color: 'hsla(0, 0%, 100%, 0.45)',
  },
};

export function ModeSwitcher({ mode, onModeChange }: ModeSwitcherProps) {
  return (
    <div style={styles.container} onClick={(e) => e.stopPropagation()}>
      {MODES.map(({ id, label }) => (
        <button
          key={id}
          style={{
            ...styles.button,
            ...(mode === id ? styles.buttonActive : styles.buttonInactive),
          }}
          onClick={() => onModeChange(id)}
        >
          {label}
        </button>
      ))}
    </div>
  );
}
