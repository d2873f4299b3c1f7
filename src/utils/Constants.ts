// RENDER-KONFIGURATION
export const RENDER_CONFIG = {
    DEFAULT_WIDTH: 400,
    DEFAULT_ASPECT_RATIO: 16 / 9,
    DEFAULT_SAMPLES_PER_PIXEL: 100,
    DEFAULT_MAX_DEPTH: 10,
    MAX_WIDTH: 8192,
    MAX_SAMPLES_PER_PIXEL: 100_000,
    MAX_DEPTH_LIMIT: 500,
} as const;

// KAMERA-KONFIGURATION (Standard-Szene)
export const CAMERA_CONFIG = {
    LOOK_FROM: [3, 3, 2],
    LOOK_AT: [0, 0, -1],
    VUP: [0, 1, 0],
    VFOV: 20,           // Grad, vertikal
    APERTURE: 2.0,      // Linsendurchmesser
} as const;

export const MATH_CONFIG = {
    T_MIN: 0.001,               // Untere Grenze gegen "Shadow Acne"
    NEAR_ZERO: 1e-8,            // Schwelle für degenerierte Richtungen
    MAX_CHANNEL: 0.999,         // Clamp vor der 8-Bit-Skalierung
    CHANNEL_SCALE: 256,
} as const;

// Hintergrund: vertikaler Verlauf Weiß → Himmelblau
export const BACKGROUND_CONFIG = {
    BOTTOM: [1.0, 1.0, 1.0],
    TOP: [0.5, 0.7, 1.0],
} as const;

export const OUTPUT_CONFIG = {
    DEFAULT_PATH: 'render.png',
    DEFAULT_BLEND_ALPHA: 0.5,
    PROGRESS_STEPS: 10,         // Fortschritt in 10%-Schritten melden
} as const;
