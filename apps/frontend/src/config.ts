// Front-end configuration, read from Vite env vars at build time

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

export const CELL_SIZE = parsePositiveInt(import.meta.env.VITE_CELL_SIZE, 80) // pixels
export const DISC_OUTLINE = 2

// Structured game events go to the console in dev unless turned off explicitly
export const LOG_EVENTS = (import.meta.env.VITE_LOG_EVENTS || (import.meta.env.DEV ? 'true' : 'false')) === 'true'

export const COLORS = {
  board: '#0a4ea1',
  empty: '#ffffff',
  P1: '#f5d20c', // yellow
  P2: '#d62828', // red
} as const
