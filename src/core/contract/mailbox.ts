// src/core/contract/mailbox.ts
import { MailboxABI } from '../internal/abi-registry';
import { lazy } from '../utils/lazy';
import { createContractCodec, type ContractCodec } from './codec';

/**
 * Process-wide Mailbox registry, built on first use.
 * Every call returns the same instance.
 */
export const getMailboxCodec: () => ContractCodec = lazy(() =>
  createContractCodec(MailboxABI, { name: 'Mailbox' }),
);

export { MailboxABI };
