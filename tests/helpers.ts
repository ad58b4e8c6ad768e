/**
 * Shared fixtures for the test suites.
 */

import * as path from 'node:path';
import { resolve } from '../src/config/resolver';
import { validate } from '../src/config/validator';
import type { ConfigDocument, EffectiveSettings } from '../src/config/types';
import type { AddressRecord } from '../src/parser/types';

export const clientEntry = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
    display_name: 'Test Client',
    defaults: { service: 'T24', weight_kg: 1 },
    services: [
        { name: 'Tracked 48', code: 'T48', trigger: { type: 'tag', tag: 'T48' } },
        { name: 'Tracked 24', code: 'T24', trigger: { type: 'default' } },
    ],
    template_mapping: {
        full_name: 1,
        address_line_1: 2,
        address_line_2: 3,
        town_city: 4,
        county: 5,
        postcode: 6,
        country: 7,
        service: 8,
        weight_kg: 9,
        reference: 10,
    },
    ...overrides,
});

export const configDocument = (clients: Record<string, Record<string, unknown>> = { client_01: clientEntry() }): ConfigDocument =>
    ({ ...clients });

export const configYaml = `client_01:
  display_name: Test Client
  defaults:
    service: T24
    weight_kg: 1
  services:
    - name: Tracked 48
      code: T48
      trigger:
        type: tag
        tag: T48
    - name: Tracked 24
      code: T24
      trigger:
        type: default
  template_mapping:
    full_name: 1
    address_line_1: 2
    address_line_2: 3
    town_city: 4
    county: 5
    postcode: 6
    country: 7
    service: 8
    weight_kg: 9
    reference: 10
`;

export const settingsFor = (root: string, entry: Record<string, unknown> = clientEntry()): EffectiveSettings =>
    resolve(validate(configDocument({ client_01: entry })), 'client_01', { clientsRoot: path.join(root, 'Clients') });

export const TWO_RECIPIENTS = [
    'Grace O\'Neil, Flat 2, 10 High Street, Stonehaven, Aberdeenshire, AB538HY, UK',
    '',
    'Martin Wilkie, Unit 7, Riverside Estate, Dock Road, Barry, CF644BU, United Kingdom',
].join('\n');

export const addressRecord = (overrides: Partial<AddressRecord> = {}): AddressRecord => ({
    full_name: 'Grace O\'Neil',
    address_line_1: 'Flat 2',
    address_line_2: '10 High Street',
    town_city: 'Stonehaven',
    county: 'Aberdeenshire',
    postcode: 'AB53 8HY',
    country: 'UNITED KINGDOM',
    service: 'T24',
    weight_kg: 1,
    notes: '',
    ...overrides,
});
