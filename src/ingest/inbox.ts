import * as path from 'node:path';
import dayjs from 'dayjs';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import { INBOX_STAGING_DIR, TELEGRAM_FILE_PREFIX, WATCH_EXTENSION } from '../constants';

export interface InboxInstance {
    /** Drops a message into a watch folder and returns the file name used. */
    write(inTxtDir: string, chatId: number, content: string, receivedAt?: Date): Promise<string>;
}

/**
 * Messages are staged under `.tmp/` inside the watch folder and renamed into
 * place, so the watcher never sees a partly written order.
 */
export const create = (): InboxInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const freeName = async (inTxtDir: string, stem: string): Promise<string> => {
        for (let counter = 0; ; counter++) {
            const name = counter === 0 ? `${stem}${WATCH_EXTENSION}` : `${stem}_${counter}${WATCH_EXTENSION}`;
            if (!await storage.exists(path.join(inTxtDir, name))) {
                return name;
            }
        }
    };

    const write = async (inTxtDir: string, chatId: number, content: string, receivedAt: Date = new Date()): Promise<string> => {
        const stagingDir = path.join(inTxtDir, INBOX_STAGING_DIR);
        await storage.createDirectory(stagingDir);

        const fileName = await freeName(inTxtDir, `${TELEGRAM_FILE_PREFIX}${dayjs(receivedAt).format('YYYYMMDD_HHmmss')}_${chatId}`);
        const stagingPath = path.join(stagingDir, `${fileName}.${process.pid}.tmp`);
        await storage.writeFile(stagingPath, content, 'utf-8');
        await storage.moveFile(stagingPath, path.join(inTxtDir, fileName));

        logger.info('Saved message chat_id=%d file=%s length=%d', chatId, fileName, content.length);
        return fileName;
    };

    return { write };
};
