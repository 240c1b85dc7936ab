export * from './common/params.js';
export * from './common/pagination.js';

export * from './entities/ads.js';
export * from './entities/bits.js';
export * from './entities/channel.js';
export * from './entities/chat.js';
export * from './entities/clip.js';
export * from './entities/conduit.js';
export * from './entities/extension.js';
export * from './entities/game.js';
export * from './entities/rewards.js';
export * from './entities/stream.js';
export * from './entities/team.js';
export * from './entities/video.js';
