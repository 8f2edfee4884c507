/**
 * Registry for node backend implementations.
 *
 * @remarks
 * The registry maps backend kinds to factory functions, so the backend is
 * chosen once from the execution profile and everything downstream depends
 * only on the {@link NodeBackend} interface.
 */

import { ConfigurationError } from '../errors.js'
import type { ExecutionProfile } from '../types.js'
import { DockerNodeBackend } from './docker-backend.js'
import { NativeNodeBackend } from './native-backend.js'
import type { NodeBackend, NodeBackendFactory, NodeBackendOptions } from './types.js'

/**
 * Registry for node backend implementations.
 *
 * Note: This class is used as a namespace for static methods.
 * @public
 */
// eslint-disable-next-line @typescript-eslint/no-extraneous-class
export class NodeBackendRegistry {
  private static backends = new Map<string, NodeBackendFactory>()

  /**
   * Register a backend factory.
   * @param kind - Value of the profile's `backend` field
   * @param factory - Factory function to create backend instances
   */
  static register(kind: string, factory: NodeBackendFactory): void {
    this.backends.set(kind, factory)
  }

  /**
   * Create the backend for a profile.
   * @throws {@link ConfigurationError} if no backend is registered for the profile's kind
   */
  static create(profile: ExecutionProfile, options: NodeBackendOptions = {}): NodeBackend {
    const factory = this.backends.get(profile.backend)
    if (factory === undefined) {
      throw new ConfigurationError(
        `Unknown backend: ${profile.backend}. ` +
          `Available backends: ${Array.from(this.backends.keys()).join(', ')}`,
        'backend',
      )
    }
    return factory(profile, options)
  }

  /**
   * Get all registered backend kinds.
   */
  static getKinds(): string[] {
    return Array.from(this.backends.keys())
  }

  /**
   * Restore the built-in backends, dropping any custom registrations.
   * Intended for use in tests only.
   * @internal
   */
  static reset(): void {
    this.backends.clear()
    registerBuiltins()
  }
}

function registerBuiltins(): void {
  NodeBackendRegistry.register('docker', (profile, options) => {
    if (profile.backend !== 'docker') {
      throw new ConfigurationError('The docker backend needs a docker profile', 'backend')
    }
    return new DockerNodeBackend(profile, options)
  })
  NodeBackendRegistry.register('native', (profile, options) => {
    if (profile.backend !== 'native') {
      throw new ConfigurationError('The native backend needs a native profile', 'backend')
    }
    return new NativeNodeBackend(profile, options)
  })
}

registerBuiltins()

/** Create the node backend selected by `profile.backend`. */
export function createNodeBackend(
  profile: ExecutionProfile,
  options: NodeBackendOptions = {},
): NodeBackend {
  return NodeBackendRegistry.create(profile, options)
}
