import { closeDb } from './index.js';
import './migrate.js';
import argon2 from 'argon2';
import * as readline from 'readline';
import { findAdmin, updatePasswordHash } from '../modules/users/repo.js';

function promptPassword(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

async function resetAdminPassword() {
  try {
    const admin = findAdmin();
    if (!admin) {
      console.error('No admin account found. Register the first user first.');
      process.exitCode = 1;
      return;
    }

    console.log(`Resetting password for admin: ${admin.email}`);

    const password = await promptPassword('Enter new password: ');
    if (password.length < 8) {
      console.error('Password must be at least 8 characters.');
      process.exitCode = 1;
      return;
    }

    const confirmPassword = await promptPassword('Confirm new password: ');
    if (password !== confirmPassword) {
      console.error('Passwords do not match.');
      process.exitCode = 1;
      return;
    }

    updatePasswordHash(admin.id, await argon2.hash(password));
    console.log(`Password reset successfully for admin: ${admin.email}`);
  } catch (error) {
    console.error('Error resetting password:', error);
    process.exitCode = 1;
  } finally {
    closeDb();
  }
}

void resetAdminPassword();
