#!/usr/bin/env node
/**
 * refnote CLI entrypoint
 *
 * Imports the CLI module, which parses its own arguments.
 */

import './cli.js';
