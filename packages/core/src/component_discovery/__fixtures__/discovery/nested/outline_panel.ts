import type { ComponentAnnotation } from '../../../component_discovery';
import type { ComponentContext } from '../../../../component_registry/component_registry.types';

export class OutlinePanel {
  static readonly component: ComponentAnnotation = {
    type: 'view',
    id: 'outline',
    parentId: 'workspace',
    dependencies: ['wordCounter'],
    tags: ['layout', 'navigation'],
  };

  constructor(readonly context: ComponentContext) {}
}

export default OutlinePanel;
