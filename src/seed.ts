import type SQLite from "better-sqlite3";
import { type Generated } from "kysely";

// Example table interfaces
export interface UserTable {
	id: Generated<number>;
	username: string;
}

export interface ProfileTable {
	id: Generated<number>;
	user_id: number;
	bio: string | null;
}

export interface PostTable {
	id: Generated<number>;
	user_id: number;
	title: string;
}

export interface CommentTable {
	id: Generated<number>;
	post_id: number;
	user_id: number;
	content: string;
}

// Kysely Database interface
export interface SeedDB {
	users: UserTable;
	profiles: ProfileTable;
	posts: PostTable;
	comments: CommentTable;
}

/**
 * Creates the example schema and fills it with a few predictable rows.
 */
export function seed(db: SQLite.Database): void {
	db.pragma(`foreign_keys = ON`);

	db.exec(`CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL
  );`);

	db.exec(`CREATE TABLE IF NOT EXISTS profiles (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL UNIQUE,
    bio TEXT,
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
  );`);

	db.exec(`CREATE TABLE IF NOT EXISTS posts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    title TEXT NOT NULL,
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
  );`);

	db.exec(`CREATE TABLE IF NOT EXISTS comments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    post_id INTEGER NOT NULL,
    user_id INTEGER NOT NULL,
    content TEXT NOT NULL,
    FOREIGN KEY (post_id) REFERENCES posts(id) ON DELETE CASCADE,
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
  );`);

	db.exec(`INSERT INTO users (username) VALUES
    ('alice'),
    ('bob'),
    ('carol');
  `);

	// carol has no profile.
	db.exec(`INSERT INTO profiles (user_id, bio) VALUES
    (1, 'Bio for user 1'),
    (2, NULL);
  `);

	db.exec(`INSERT INTO posts (user_id, title) VALUES
    (1, 'Post 1'),
    (2, 'Post 2'),
    (1, 'Post 3');
  `);

	db.exec(`INSERT INTO comments (post_id, user_id, content) VALUES
    (1, 2, 'Comment 1 on post 1'),
    (1, 3, 'Comment 2 on post 1'),
    (2, 1, 'Comment 3 on post 2');
  `);
}
