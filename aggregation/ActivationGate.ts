/**
 * Activation Gate
 * On/off switch for publication. Aggregation and polling never consult it.
 */

export class ActivationGate {
  private active: boolean;

  constructor(initiallyActive: boolean = true) {
    this.active = initiallyActive;
  }

  toggle(): boolean {
    this.active = !this.active;
    return this.active;
  }

  set(active: boolean): void {
    this.active = active;
  }

  isActive(): boolean {
    return this.active;
  }
}
