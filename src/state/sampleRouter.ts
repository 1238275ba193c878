import type { NamedLandmarks, Vec3 } from '../core/models/types';

export type RoutedSample =
  | { kind: 'position'; position: Vec3; timestamp: number }
  | { kind: 'landmarks'; landmarks: NamedLandmarks; timestamp: number };

export type SampleCallback = (sample: RoutedSample) => void;

/**
 * Fans accepted samples out to external consumers (smoothness scoring,
 * recorders). One subscriber throwing never affects the others.
 */
export class SampleRouter {
  private callbacks = new Set<SampleCallback>();

  subscribe(callback: SampleCallback): () => void {
    this.callbacks.add(callback);
    console.log(`[SampleRouter] Subscriber added (${this.callbacks.size} total)`);

    return () => {
      if (this.callbacks.delete(callback)) {
        console.log(`[SampleRouter] Subscriber removed (${this.callbacks.size} remaining)`);
      }
    };
  }

  route(sample: RoutedSample) {
    this.callbacks.forEach(callback => {
      try {
        callback(sample);
      } catch (err) {
        console.error('[SampleRouter] Callback error:', err);
      }
    });
  }

  clear() {
    this.callbacks.clear();
  }

  getSubscriberCount(): number {
    return this.callbacks.size;
  }
}
