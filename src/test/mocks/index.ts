export { Point, NamedPoint, PointAttr, pointAccessor, createVectorAccessor } from './targets';
