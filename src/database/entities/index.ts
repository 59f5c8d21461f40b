export * from './audio-item.entity';
export * from './segment.entity';
