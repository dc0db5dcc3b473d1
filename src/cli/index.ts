#!/usr/bin/env node

import chalk from 'chalk';
import gradient from 'gradient-string';
import figlet from 'figlet';
import { createSpinner } from 'nanospinner';
import { HELP_MESSAGES } from '../config/defaults.js';
import { NtsService } from '../services/NtsService.js';
import { ErrorNts, ManejadorErrores } from '../utils/ErrorHandler.js';
import { formatLiveSection, formatMixtapesSection } from './Printer.js';

export class NtsCLI {
    private service: NtsService;
    private manejadorErrores: ManejadorErrores;

    constructor(service: NtsService = new NtsService()) {
        this.service = service;
        this.manejadorErrores = new ManejadorErrores();
    }

    async main(): Promise<void> {
        this.showWelcome();

        try {
            await this.showLiveChannels();
            await this.showMixtapes();
        } catch (error) {
            if (error instanceof ErrorNts) {
                console.error(chalk.red('\n❌ ' + this.manejadorErrores.obtenerMensajeAmigable(error)));
                process.exit(1);
            }
            throw error;
        }
    }

    showWelcome(): void {
        const title = figlet.textSync('NTS', {
            font: 'Big',
            horizontalLayout: 'default',
            verticalLayout: 'default'
        });

        console.log(gradient.pastel.multiline(title));
        console.log(gradient.pastel.multiline([
            HELP_MESSAGES.WELCOME,
            HELP_MESSAGES.DESCRIPTION
        ].join('\n')));
        console.log('\n' + chalk.gray('─'.repeat(60)) + '\n');
    }

    /**
     * Consulta y muestra lo que suena en cada canal
     */
    async showLiveChannels(): Promise<void> {
        const spinner = createSpinner(HELP_MESSAGES.LOADING_LIVE).start();
        try {
            const broadcasts = await this.service.getCurrentBroadcasts();
            spinner.success({ text: `${broadcasts.length} canales en vivo` });
            console.log(formatLiveSection(broadcasts).join('\n'));
        } catch (error) {
            spinner.error({ text: 'No se pudieron obtener los canales en vivo' });
            throw error;
        }
    }

    /**
     * Consulta y muestra las mixtapes disponibles
     */
    async showMixtapes(): Promise<void> {
        const spinner = createSpinner(HELP_MESSAGES.LOADING_MIXTAPES).start();
        try {
            const mixtapes = await this.service.getMixtapes();
            spinner.success({ text: `${mixtapes.results.length} mixtapes` });
            console.log(formatMixtapesSection(mixtapes).join('\n'));
        } catch (error) {
            spinner.error({ text: 'No se pudieron obtener las mixtapes' });
            throw error;
        }
    }
}

// Main execution
async function main() {
    const cli = new NtsCLI();
    await cli.main();
}

main().catch((error) => {
    console.error(chalk.red('Error fatal:'), error);
    process.exit(1);
});
