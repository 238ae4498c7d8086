/**
 * Replicate Model Sizing Configuration
 *
 * Maps Replicate model families to the sizing parameters they accept.
 * Add new model patterns here to support additional models.
 */

export interface ModelSizingConfig {
    /** Model rejects width/height and only takes `aspect_ratio` */
    aspectRatioOnly?: boolean;
    /** Default input parameters to apply for this model */
    defaultInputs?: Record<string, string | number | boolean>;
}

/**
 * Model sizing configurations
 * Key: model pattern (matched against model name, case-insensitive)
 * Value: how the model expects its output size
 *
 * To add a new model:
 * 1. Add a new entry with the model pattern as key
 * 2. Set aspectRatioOnly: true if the model has no width/height inputs
 */
export const MODEL_SIZING_CONFIGS: Record<string, ModelSizingConfig> = {
    //stability-ai/stable-diffusion-3, stability-ai/stable-diffusion-3.5-large
    'stable-diffusion-3': { aspectRatioOnly: true },
    'sd3': { aspectRatioOnly: true },

    //black-forest-labs/flux-1.1-pro-ultra
    'flux-1.1-pro-ultra': { aspectRatioOnly: true },

    //ideogram-ai/ideogram-v3-turbo, ideogram-ai/ideogram-v3-quality
    'ideogram-v3': { aspectRatioOnly: true },

    //google/imagen-4
    'imagen-4': { aspectRatioOnly: true },

    //bytedance/seedream-4
    'seedream-4': { aspectRatioOnly: true, defaultInputs: { size: '2K' } },

    // Default fallback (flux and most SDXL-style models take width/height)
    'default': {},
};

export const DEFAULT_ASPECT_RATIO = '16:9';

/**
 * Detects model family from model name and returns its sizing config
 */
export function getModelSizingConfig(modelName: string): ModelSizingConfig {
    const lowerModel = modelName.toLowerCase();

    for (const [pattern, config] of Object.entries(MODEL_SIZING_CONFIGS)) {
        if (pattern !== 'default' && lowerModel.includes(pattern)) {
            return config;
        }
    }

    return MODEL_SIZING_CONFIGS['default'];
}

/**
 * Rounds a requested dimension down to a multiple of 64, never below 64.
 */
export function clampDimension(value: number): number {
    return Math.floor(Math.max(64, value) / 64) * 64;
}
