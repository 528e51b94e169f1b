// playwright.config.ts

import { defineConfig } from '@playwright/test';
import path from 'path';
import { resolveBrowserUse } from './tests/e2e/config/browsers';
import { settings } from './tests/e2e/config/settings';

// Shared by every worker process spawned from here (failure CSV file name)
process.env.TEST_RUN_ID ??= new Date().toISOString().replace(/[:.]/g, '-');

export default defineConfig({
    outputDir: path.join(settings.reportDir, 'artifacts'),

    timeout: 2 * 60 * 1000,
    workers: settings.workers,
    retries: settings.retries,

    reporter: [
        ['list'],
        ['html', { outputFolder: path.join(settings.reportDir, 'html'), open: 'never' }],
    ],

    projects: [
        // In-process checks of the data layer and helpers; never launches a browser
        {
            name: 'unit',
            testDir: './tests/unit',
            testMatch: /.*\.spec\.ts$/,
        },
        {
            name: 'setup',
            testDir: './tests/e2e',
            testMatch: /.*\.setup\.ts$/,
        },
        {
            name: 'e2e',
            testDir: './tests/e2e',
            testMatch: /.*\.spec\.ts$/,
            dependencies: ['setup'],
            use: {
                ...resolveBrowserUse(settings.browser),
                baseURL: settings.baseUrl,
                headless: settings.headless,
                actionTimeout: settings.actionTimeoutMs,
                navigationTimeout: settings.navigationTimeoutMs,
                ignoreHTTPSErrors: true,
                trace: 'on-first-retry',
                // Failure screenshots are taken by the report fixture
                screenshot: 'off',
                locale: 'en-US',
            },
        },
    ],
});
