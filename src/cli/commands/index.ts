export { seedCommand } from './seedCommand';
export { channelsCommand } from './channelsCommand';
export { rrfCommand } from './rrfCommand';
export { rerankCommand } from './rerankCommand';
export { sensitivityCommand } from './sensitivityCommand';
