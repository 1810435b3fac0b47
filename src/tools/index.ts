/**
 * tools/index.ts
 *
 * Import every tool module here. The act of importing triggers each
 * module's self-registration call (registry.register(…)) at the bottom
 * of its file.
 */

import './display_manager';
import './profile_manager';
