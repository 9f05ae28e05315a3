export * from './account-operation.exception';
export * from './invalid-amount.exception';
export * from './account-frozen.exception';
export * from './counterparty-frozen.exception';
export * from './insufficient-funds.exception';
export * from './invalid-target.exception';
export * from './lock-timeout.exception';
