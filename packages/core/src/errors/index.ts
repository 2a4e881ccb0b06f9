export * from './taxonomy';
export * from './outcome';
