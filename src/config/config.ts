// src/config/config.ts

interface ServerConfig {
    NAME: string;
    VERSION: string;
}

interface RenderConfig {
    INDENT: string;
    CAUSE_PREFIX: string;
    BACKTRACE_HEADER: string;
    MAX_FRAMES: number;
}

interface DemoConfig {
    CONFIG_FILE: string;
    MIN_PORT: number;
    MAX_PORT: number;
}

interface Config {
    SERVER: ServerConfig;
    RENDER: RenderConfig;
    DEMO: DemoConfig;
}

/**
 * Centralized configuration for faultline.
 */
export const CONFIG: Config = {
    SERVER: {
        NAME: 'faultline',
        VERSION: '1.0.0',
    },

    RENDER: {
        INDENT: '  ',            // one unit per level of nesting
        CAUSE_PREFIX: 'caused by: ',
        BACKTRACE_HEADER: 'stack backtrace:',
        MAX_FRAMES: 64,
    },

    DEMO: {
        CONFIG_FILE: 'faultline.config.json',
        MIN_PORT: 1,
        MAX_PORT: 65535,
    },
};
