export type FlashMode = 'configure_check' | 'write';

export type FlashJobState = 'idle' | 'running' | 'succeeded' | 'failed';
