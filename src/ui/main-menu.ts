import { FileService } from '../service/file-service';
import { FileKeeperError } from '../errors';
import { FileRecord } from '../model/file-record';
import { END_OF_INPUT_MARKER } from '../utils/constants';
import { Prompter } from './prompter';
import {
    ANSI,
    displayBanner,
    displayContent,
    displayFailure,
    displayRecordDetail,
    displayRecordTable,
    displaySeparator,
    displaySubHeader,
    info,
    success,
    warning
} from './console-view';

interface MenuItem {
    label: string;
    handler: () => Promise<void>;
}

const LOOKUP_PROMPT = 'Enter file ID (first 8 chars) or file name: ';

/**
 * Interactive console menu. Gathers input, calls FileService, renders the
 * outcome. Ends on choice 0 or when input runs out.
 */
export class MainMenu {
    private running = false;
    private readonly items: Map<string, MenuItem>;

    constructor(
        private readonly service: FileService,
        private readonly prompter: Prompter,
        private readonly registryLocation: string
    ) {
        this.items = new Map<string, MenuItem>([
            ['1', { label: 'Create File', handler: () => this.handleCreate() }],
            ['2', { label: 'List All Files', handler: () => this.handleListAll() }],
            ['3', { label: 'View File', handler: () => this.handleView() }],
            ['4', { label: 'Edit File Content', handler: () => this.handleEditContent() }],
            ['5', { label: 'Rename File', handler: () => this.handleRename() }],
            ['6', { label: 'Move File', handler: () => this.handleMove() }],
            ['7', { label: 'Change Category', handler: () => this.handleChangeCategory() }],
            ['8', { label: 'Delete File', handler: () => this.handleDelete() }],
            ['9', { label: 'List by Category', handler: () => this.handleListByCategory() }],
            ['10', { label: 'Export Listing to CSV', handler: () => this.handleExportCsv() }]
        ]);
    }

    async run(): Promise<void> {
        displayBanner('FILEKEEPER');
        info(`Registry lives in: ${this.registryLocation}`);
        info('Type a menu number and press Enter.');

        this.running = true;
        while (this.running) {
            this.printMenu();
            const choice = await this.ask('Your choice: ');
            if (choice === null) {
                break;
            }

            if (choice === '0') {
                this.running = false;
                break;
            }

            const item = this.items.get(choice);
            if (item) {
                await item.handler();
            } else {
                warning(`Invalid choice. Please enter 0-${this.items.size}.`);
            }
        }

        displayBanner('GOODBYE!');
        this.prompter.close();
    }

    private printMenu(): void {
        console.log('');
        displaySeparator();
        console.log(`${ANSI.bold}${ANSI.cyan}  [*] MAIN MENU${ANSI.reset}`);
        displaySeparator();
        for (const [key, item] of this.items) {
            this.printMenuItem(key, item.label);
        }
        displaySeparator();
        this.printMenuItem('0', 'Exit');
        displaySeparator();
    }

    private printMenuItem(key: string, label: string): void {
        console.log(`  ${ANSI.green}${ANSI.bold}[${key}]${ANSI.reset}  ${label}`);
    }

    // ============== HANDLERS ==============

    private async handleCreate(): Promise<void> {
        displaySubHeader('Create New File');

        const fileName = await this.ask('File name (e.g. notes.txt)              : ');
        if (fileName === null) return;
        const storagePath = await this.ask('Storage path (directory)                : ');
        if (storagePath === null) return;
        const category = await this.ask("Category (or press Enter for 'General') : ");
        if (category === null) return;

        info(`Enter file content  (type ${END_OF_INPUT_MARKER} on a new line to finish):`);
        const content = await this.readMultiLine();

        const result = await this.service.createFile({ fileName, storagePath, category, content });
        if (!result.success) return this.handleFailure(result.error);

        success('File created successfully!');
        displayRecordDetail(result.value);
    }

    private async handleListAll(): Promise<void> {
        displaySubHeader('All Files');
        const records = this.service.readAll();
        displayRecordTable(records);
        info(`Total files: ${records.length}`);
    }

    private async handleView(): Promise<void> {
        displaySubHeader('View File');
        const query = await this.ask(LOOKUP_PROMPT);
        if (query === null) return;

        const result = await this.service.refreshContent(query);
        if (!result.success) return this.handleFailure(result.error);
        displayRecordDetail(result.value);
    }

    private async handleEditContent(): Promise<void> {
        displaySubHeader('Edit File Content');
        const record = await this.lookup();
        if (!record) return;

        info('Current content:');
        displaySeparator();
        displayContent(record.content);
        displaySeparator();

        info(`Enter NEW content (type ${END_OF_INPUT_MARKER} on a new line to finish):`);
        const content = await this.readMultiLine();

        const result = await this.service.updateContent(record.id, content);
        if (!result.success) return this.handleFailure(result.error);
        success('Content updated successfully!');
    }

    private async handleRename(): Promise<void> {
        displaySubHeader('Rename File');
        const record = await this.lookup();
        if (!record) return;

        info(`Current name: ${record.fileName}`);
        const newName = await this.ask('New file name: ');
        if (newName === null) return;

        const result = await this.service.renameFile(record.id, newName);
        if (!result.success) return this.handleFailure(result.error);
        success(`File renamed to: ${result.value.fileName}`);
    }

    private async handleMove(): Promise<void> {
        displaySubHeader('Move File');
        const record = await this.lookup();
        if (!record) return;

        info(`Current path: ${record.storagePath}`);
        const newPath = await this.ask('New storage path (directory): ');
        if (newPath === null) return;

        const result = await this.service.moveFile(record.id, newPath);
        if (!result.success) return this.handleFailure(result.error);
        success(`File moved to: ${result.value.storagePath}`);
    }

    private async handleChangeCategory(): Promise<void> {
        displaySubHeader('Change Category');
        const record = await this.lookup();
        if (!record) return;

        info(`Current category: ${record.category}`);
        const category = await this.ask('New category: ');
        if (category === null) return;

        const result = await this.service.updateCategory(record.id, category);
        if (!result.success) return this.handleFailure(result.error);
        success(`Category updated to: ${result.value.category}`);
    }

    private async handleDelete(): Promise<void> {
        displaySubHeader('Delete File');
        const record = await this.lookup();
        if (!record) return;

        warning(`You are about to DELETE: ${record.fileName}  at  ${record.storagePath}`);
        const confirm = await this.ask('Confirm? (yes / no): ');
        if (confirm === null) return;

        const answer = confirm.toLowerCase();
        if (answer !== 'yes' && answer !== 'y') {
            info('Deletion cancelled.');
            return;
        }

        const result = await this.service.deleteFile(record.id);
        if (!result.success) return this.handleFailure(result.error);
        success('File deleted successfully.');
    }

    private async handleListByCategory(): Promise<void> {
        displaySubHeader('List by Category');

        const categories = this.service.categories();
        if (categories.length === 0) {
            warning('No categories exist yet.');
            return;
        }

        info('Available categories:');
        for (const category of categories) {
            console.log(`      * ${category}`);
        }

        const category = await this.ask('Enter category name: ');
        if (category === null) return;
        displayRecordTable(this.service.readByCategory(category));
    }

    private async handleExportCsv(): Promise<void> {
        displaySubHeader('Export Listing to CSV');
        const csvPath = await this.ask('CSV file path: ');
        if (csvPath === null) return;

        const result = await this.service.exportCsv(csvPath);
        if (!result.success) return this.handleFailure(result.error);
        success(`Exported ${result.value} record(s) to: ${csvPath}`);
    }

    // ============== SHARED HELPERS ==============

    private async lookup(): Promise<FileRecord | null> {
        const query = await this.ask(LOOKUP_PROMPT);
        if (query === null) return null;

        const result = this.service.resolve(query);
        if (!result.success) {
            displayFailure(result.error);
            return null;
        }
        return result.value;
    }

    /**
     * Shows the failure and, for partially applied operations, offers to
     * retry the registry rewrite.
     */
    private async handleFailure(failure: FileKeeperError): Promise<void> {
        displayFailure(failure);
        if (failure.partiallyApplied) {
            await this.offerRetry(failure);
        }
    }

    private async offerRetry(failure: FileKeeperError): Promise<void> {
        const answer = await this.ask('Retry registry update? [Y/n]: ');
        if (answer === null || answer.toLowerCase() === 'n') {
            warning(`Registry left behind disk: ${failure.message}`);
            return;
        }

        const retry = await this.service.retryPersist();
        if (retry.success) {
            success(`Registry updated (${retry.value} record(s)).`);
        } else {
            displayFailure(retry.error);
        }
    }

    private async ask(label: string): Promise<string | null> {
        const answer = await this.askRaw(`  ${ANSI.yellow}${label}${ANSI.reset}`);
        return answer === null ? null : answer.trim();
    }

    private async askRaw(query: string): Promise<string | null> {
        const answer = await this.prompter.question(query);
        if (answer === null) {
            this.running = false;
        }
        return answer;
    }

    /**
     * Lines up to (not including) an END line, joined with LF. End of input
     * also finishes the block.
     */
    private async readMultiLine(): Promise<string> {
        const lines: string[] = [];
        for (;;) {
            const line = await this.askRaw('');
            if (line === null || line.trim().toUpperCase() === END_OF_INPUT_MARKER) {
                break;
            }
            lines.push(line);
        }
        return lines.join('\n');
    }
}
