// Page entry point; mkdocs.yml lists the compiled file under `extra_javascript`.
import { initializeDiagrams } from './mermaid_init.js';

initializeDiagrams(globalThis);
