/**
 * Tool auto-registration
 *
 * Import all tools to trigger their registration.
 */

import './type-define.js';
import './attribute-define.js';
import './relationship-type-define.js';
import './model-create.js';
import './trait-assign.js';
import './attribute-set.js';
import './relation-create.js';
import './model-get.js';
import './people-list.js';
import './person-add.js';
