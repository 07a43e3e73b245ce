// ── Engine ──

/** Half-width of the square window, centred on the grid, where an agent starts. */
export const START_WINDOW_RADIUS = 2;

// ── Export ──

/** File name stem used when the trail has no name. */
export const DEFAULT_TRAIL_NAME = "untitled_trail";

/** Extension appended to exported trail files. */
export const TRAIL_FILE_EXTENSION = ".txt";

// ── Driver ──

/** Default simulation steps executed per second of wall-clock time (one per frame at 30 fps). */
export const DEFAULT_STEPS_PER_SECOND = 30;

/** Step-rate choices offered in the UI. */
export const SPEED_OPTIONS = [5, 15, 30, 60, 120, 300, 600];

// ── Rendering ──

/** Target rendering frame rate, used for rAF frame-rate capping. */
export const TARGET_FPS = 30;

/** Largest side, in pixels, of the square area the grid is drawn into. */
export const SIM_AREA_SIZE = 512;

/** Canvas background. */
export const BG_COLOR = 0x191928;

/** Background of the grid area. */
export const GRID_BG_COLOR = 0x28283c;

/** Fill for Visited cells. */
export const TRAIL_COLOR = 0xf59e0b;

/** Fill for the agent marker. */
export const AGENT_COLOR = 0xef4444;
