export * from './precision';
export * from './report';
