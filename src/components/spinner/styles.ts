// Inline styles shared by the simulation views
export const styles = {
  container: {
    position: 'fixed' as const,
    inset: 0,
    overflow: 'hidden',
    backgroundColor: '#0b1020',
    display: 'flex',
    alignItems: 'center',
    justifyContent: 'center',
  },
  canvas: {
    maxWidth: '100%',
    maxHeight: '100%',
  },
  controlPanel: {
    position: 'absolute' as const,
    bottom: 16,
    left: 16,
    zIndex: 20,
    backgroundColor: 'rgba(20, 30, 45, 0.85)',
    borderRadius: 16,
    padding: 16,
    color: '#e6eef8',
    fontFamily: 'system-ui, sans-serif',
    minWidth: 200,
  },
  title: {
    fontSize: 20,
    fontWeight: 'bold' as const,
    marginBottom: 12,
  },
  button: {
    padding: '10px 20px',
    borderRadius: 8,
    fontWeight: 500,
    border: 'none',
    cursor: 'pointer',
    fontSize: 14,
    color: 'white',
    transition: 'background-color 0.2s',
  },
  buttonStart: {
    backgroundColor: '#6be36b',
    color: '#0b1020',
  },
  buttonStop: {
    backgroundColor: '#ff6b6b',
  },
  error: {
    color: '#f87171',
    fontSize: 12,
    marginBottom: 8,
  },
  stats: {
    marginTop: 12,
    fontSize: 11,
    color: '#a1a1aa',
  },
};
