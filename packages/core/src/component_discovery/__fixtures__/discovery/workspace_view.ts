import type { ComponentAnnotation } from '../../component_discovery';

export class WorkspaceView {
  static readonly component: ComponentAnnotation = {
    type: 'view',
    id: 'workspace',
    description: 'Main window layout',
    tags: ['layout'],
  };
}
