export * from './schemas/auth.js';
export * from './schemas/comment.js';
export * from './schemas/contact.js';
export * from './schemas/message.js';
export * from './schemas/params.js';
export * from './schemas/post.js';
