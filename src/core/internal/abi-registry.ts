// src/core/internal/abi-registry.ts
export { default as MailboxABI } from './abis/Mailbox';
