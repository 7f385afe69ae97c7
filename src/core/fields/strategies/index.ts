import type { BaseFieldStrategy } from '../types';
import { AttributeStrategy } from './AttributeStrategy';
import { LocatorStrategy } from './LocatorStrategy';
import { PatternStrategy } from './PatternStrategy';
import { SelectorStrategy } from './SelectorStrategy';

export { AttributeStrategy, LocatorStrategy, PatternStrategy, SelectorStrategy };

export function defaultStrategies(): BaseFieldStrategy[] {
  return [new SelectorStrategy(), new LocatorStrategy(), new PatternStrategy(), new AttributeStrategy()];
}
