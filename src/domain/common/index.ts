export { Either, Left, Right, left, right } from './either';
export { must } from './must';
