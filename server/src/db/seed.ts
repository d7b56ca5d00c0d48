import { closeDb } from './index.js';
import './migrate.js';
import argon2 from 'argon2';
import { createUser, findByEmail } from '../modules/users/repo.js';
import { createPost, isTitleTaken } from '../modules/posts/repo.js';
import { formatPostDate } from '../utils/dates.js';

const SAMPLE_POST = {
  title: 'Welcome to the blog',
  subtitle: 'A first post to check that everything renders',
  body: '<p>This post was created by the seed script. Log in as the admin to edit or delete it.</p>',
  img_url: 'https://example.com/images/welcome.jpg',
  project_url: null,
};

async function seed() {
  const email = process.env.SEED_EMAIL ?? 'admin@example.com';
  const password = process.env.SEED_PASSWORD ?? 'admin12345';
  const name = process.env.SEED_NAME ?? 'Admin';

  let authorId = findByEmail(email)?.id;
  if (authorId === undefined) {
    const created = createUser({
      name,
      email,
      passwordHash: await argon2.hash(password),
    });
    authorId = created.id;
    console.log(`Created seed user (${created.role}):`, email, '(password:', password, ')');
  } else {
    console.log('Seed user already exists:', email);
  }

  if (isTitleTaken(SAMPLE_POST.title)) {
    console.log('Sample post already exists.');
    return;
  }
  createPost(SAMPLE_POST, authorId, formatPostDate());
  console.log('Created sample post:', SAMPLE_POST.title);
}

seed()
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  })
  .finally(() => closeDb());
