export class StatusBar {
  static readonly component = { type: 'widget', id: 'statusBar' };
}
