export * from './bits.js';
export * from './channel.js';
export * from './chat.js';
export * from './clip.js';
export * from './conduit.js';
export * from './extension.js';
export * from './game.js';
export * from './parsePayload.js';
export * from './stream.js';
export * from './team.js';
export * from './user.js';
export * from './video.js';
