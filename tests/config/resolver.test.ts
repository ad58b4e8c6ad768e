import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { listClients, resolve, resolveFolders } from '../../src/config/resolver';
import { validate } from '../../src/config/validator';
import { UnknownClientError } from '../../src/errors';
import { clientEntry, configDocument } from '../helpers';

const ROOT = path.join(path.sep, 'srv', 'labelops', 'Clients');

describe('Config resolver', () => {
    it('uses the conventional folder names when none are configured', () => {
        expect(resolveFolders(ROOT, 'client_01', undefined)).toEqual({
            in_txt: path.join(ROOT, 'client_01', 'IN_TXT'),
            ready_xlsx: path.join(ROOT, 'client_01', 'READY_XLSX'),
            archive: path.join(ROOT, 'client_01', 'ARCHIVE'),
            tracking_out: path.join(ROOT, 'client_01', 'TRACKING_OUT'),
            failures: path.join(ROOT, 'client_01', 'FAILURES'),
        });
    });

    it('keeps absolute folders and joins relative ones to the client folder', () => {
        const folders = resolveFolders(ROOT, 'client_02', { in_txt: '/data/inbox', archive: 'old', failures: 'D:\\LabelOps\\fail' });

        expect(folders.in_txt).toBe('/data/inbox');
        expect(folders.archive).toBe(path.join(ROOT, 'client_02', 'old'));
        expect(folders.failures).toBe('D:\\LabelOps\\fail');
        expect(folders.ready_xlsx).toBe(path.join(ROOT, 'client_02', 'READY_XLSX'));
    });

    it('throws UnknownClientError for an unconfigured client', () => {
        const snapshot = validate(configDocument());
        expect(() => resolve(snapshot, 'client_09', { clientsRoot: ROOT })).toThrow(UnknownClientError);
    });

    it('prefers the client template, then the global one', () => {
        const snapshot = validate(configDocument({
            client_01: clientEntry({ template_path: 'template.xlsx' }),
            client_02: clientEntry(),
        }));

        expect(resolve(snapshot, 'client_01', { clientsRoot: ROOT, templatePath: '/global.xlsx' }).template_path)
            .toBe(path.join(ROOT, 'client_01', 'template.xlsx'));
        expect(resolve(snapshot, 'client_02', { clientsRoot: ROOT, templatePath: '/global.xlsx' }).template_path)
            .toBe('/global.xlsx');
        expect(resolve(snapshot, 'client_02', { clientsRoot: ROOT }).template_path).toBeNull();
    });

    it('returns copies that do not alter the snapshot', () => {
        const snapshot = validate(configDocument());
        const settings = resolve(snapshot, 'client_01', { clientsRoot: ROOT });

        settings.defaults.service = 'CHANGED';
        settings.template_mapping.full_name = 99;

        expect(snapshot.clients.client_01.defaults.service).toBe('T24');
        expect(snapshot.clients.client_01.template_mapping.full_name).toBe(1);
    });

    it('lists clients in sorted order', () => {
        const snapshot = validate(configDocument({ client_03: clientEntry(), client_01: clientEntry() }));
        expect(listClients(snapshot)).toEqual(['client_01', 'client_03']);
    });
});
