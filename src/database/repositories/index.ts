export * from './audio-items.repository';
export * from './segments.repository';
export * from './memory.database';
export * from './memory-audio-items.repository';
export * from './memory-segments.repository';
export * from './supabase-audio-items.repository';
export * from './supabase-segments.repository';
