/**
 * Simple usage - shared, weak and aliased handles
 */

import { SharedHandle, WeakHandle, makeShared } from '../packages/core/src/index';

class Connection {
  readonly settings = { retries: 3 };

  constructor(readonly host: string) {
    console.log(`open ${host}`);
  }

  dispose(): void {
    console.log(`close ${this.host}`);
  }
}

console.log('=== refhold: shared ownership ===\n');

// ===== Share one connection =====
console.log('1️⃣ Share a value between two owners');
const a = makeShared(Connection, 'db.local');
const b = SharedHandle.copy(a);
console.log('strong count:', a.strongCount()); // 2

// ===== Observe without owning =====
console.log('\n2️⃣ Observe with a weak handle');
const watcher = WeakHandle.from(a);
console.log('expired:', watcher.expired()); // false

// ===== Alias a part =====
console.log('\n3️⃣ Alias the settings, keeping the connection alive');
const settings = SharedHandle.alias(a, a.deref().settings);
console.log('retries:', settings.deref().retries);

// ===== Release =====
console.log('\n4️⃣ Release owners one by one');
a.reset();
b.reset();
console.log('still alive through alias:', !watcher.expired()); // true
settings.reset(); // close db.local
console.log('expired:', watcher.expired()); // true
console.log('lock after release:', watcher.lock().hasValue()); // false
watcher.reset();
