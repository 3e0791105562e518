/**
 * DriverRegistry - maps URI schemes to source drivers
 *
 * WHY: Registration and lookup are synchronous. On a single event loop that
 * makes each call one critical section, so a driver with several schemes is
 * either fully registered or not registered at all from any caller's view.
 */

import {
  SchemeDriverAlreadyRegisteredError,
  SchemeDriverNotRegisteredError,
} from '@projectkit/core'

import type { Driver } from './driver.js'

export class DriverRegistry {
  private drivers = new Map<string, Driver>()

  /**
   * Register a driver under every scheme it supports
   *
   * @throws SchemeDriverAlreadyRegisteredError naming the first scheme that is
   *   already taken; nothing is registered in that case
   */
  registerDriver(driver: Driver): void {
    const schemes = [...driver.getSupportedSchemes()]

    for (const scheme of schemes) {
      if (this.drivers.has(scheme)) {
        throw new SchemeDriverAlreadyRegisteredError(scheme)
      }
    }

    for (const scheme of schemes) {
      this.drivers.set(scheme, driver)
    }
  }

  /**
   * Get the driver for a scheme (exact, case-sensitive match)
   *
   * @throws SchemeDriverNotRegisteredError if no driver claims the scheme
   */
  getDriverByScheme(scheme: string): Driver {
    const driver = this.drivers.get(scheme)
    if (!driver) {
      throw new SchemeDriverNotRegisteredError(scheme)
    }
    return driver
  }

  has(scheme: string): boolean {
    return this.drivers.has(scheme)
  }

  /**
   * Get all registered schemes
   */
  getSchemes(): string[] {
    return Array.from(this.drivers.keys())
  }
}
