import { posix } from 'path';
import { MalformedLocatorError } from '../errors/malformed-locator.error';

/**
 * Locator Value Object
 * A long-form storage URI split into the container it lives in and the
 * object path inside that container:
 *
 *   azureml://subscriptions/.../datastores/recordings/paths/seq_001/recording.bin
 *   └──────────────── containerId ──────────────────┘       └── relativePath ──┘
 */
export class LocatorVO {
  static readonly PATH_MARKER = '/paths/';

  private constructor(
    private readonly _value: string,
    private readonly _containerId: string,
    private readonly _relativePath: string,
  ) {}

  /**
   * Split at the first `/paths/`. Throws MalformedLocatorError when absent.
   */
  static parse(locator: string): LocatorVO {
    const idx = locator.indexOf(LocatorVO.PATH_MARKER);
    if (idx === -1) {
      throw new MalformedLocatorError(locator, LocatorVO.PATH_MARKER);
    }

    return new LocatorVO(
      locator,
      locator.slice(0, idx),
      locator.slice(idx + LocatorVO.PATH_MARKER.length),
    );
  }

  get value(): string {
    return this._value;
  }

  get containerId(): string {
    return this._containerId;
  }

  get relativePath(): string {
    return this._relativePath;
  }

  /**
   * Last segment of the container identifier, e.g. the datastore name
   */
  get containerName(): string {
    return LocatorVO.containerNameOf(this._containerId);
  }

  /**
   * Final segment of the relative path; empty when the path is empty
   */
  get fileName(): string {
    return posix.basename(this._relativePath);
  }

  static containerNameOf(containerId: string): string {
    const segments = containerId.split('/').filter((segment) => segment.length > 0);
    return segments[segments.length - 1] ?? '';
  }

  toJSON() {
    return {
      value: this._value,
      containerId: this._containerId,
      relativePath: this._relativePath,
    };
  }
}
