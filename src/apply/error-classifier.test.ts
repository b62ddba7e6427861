import assert from 'node:assert/strict';
import { test } from 'node:test';
import { classifyReplayLine, classifyReplayOutput } from './error-classifier';

test('expected replay errors are ignorable', () => {
    assert.deepEqual(
        classifyReplayLine("ERROR 1062 (23000) at line 41: Duplicate entry '7' for key 'PRIMARY'"),
        {
            severity: 'ignorable',
            line: "ERROR 1062 (23000) at line 41: Duplicate entry '7' for key 'PRIMARY'",
            reason: 'duplicate_key',
        },
    );
    assert.equal(
        classifyReplayLine("ERROR 1050 (42S01) at line 9: Table 'orders' already exists")?.severity,
        'ignorable',
    );
    assert.equal(
        classifyReplayLine("ERROR 1032 (HY000) at line 77: Can't find record in 'orders'")?.severity,
        'ignorable',
    );
    assert.deepEqual(
        classifyReplayLine(
            'mysql: [Warning] Using a password on the command line interface can be insecure.',
        ),
        null,
    );
});

test('missing tables and unknown errors are critical', () => {
    assert.deepEqual(
        classifyReplayLine("ERROR 1146 (42S02) at line 3: Table 'shop.orders' doesn't exist"),
        {
            severity: 'critical',
            line: "ERROR 1146 (42S02) at line 3: Table 'shop.orders' doesn't exist",
        },
    );
    assert.equal(
        classifyReplayLine('ERROR 1064 (42000) at line 12: You have an error in your SQL syntax')
            ?.severity,
        'critical',
    );
    assert.equal(classifyReplayLine('ERROR 10620: made up')?.severity, 'critical');
});

test('errors naming an object called warning stay critical', () => {
    assert.deepEqual(
        classifyReplayLine("ERROR 1146 (42S02) at line 12: Table 'shop.warning' doesn't exist"),
        {
            severity: 'critical',
            line: "ERROR 1146 (42S02) at line 12: Table 'shop.warning' doesn't exist",
        },
    );
    assert.equal(
        classifyReplayLine(
            "ERROR 1064 (42000) at line 5: You have an error in your SQL syntax near 'warning'",
        )?.severity,
        'critical',
    );
});

test('lines without an error are not classified', () => {
    assert.equal(classifyReplayLine('Query OK, 1 row affected'), null);
    assert.equal(classifyReplayLine(''), null);
});

test('replay output is summarised line by line', () => {
    const summary = classifyReplayOutput([
        'mysql: [Warning] Using a password on the command line interface can be insecure.',
        "ERROR 1062 (23000) at line 41: Duplicate entry '7' for key 'PRIMARY'",
        "ERROR 1062 (23000) at line 42: Duplicate entry '8' for key 'PRIMARY'",
        "ERROR 1007 (HY000) at line 2: Can't create database 'shop'; database exists",
        "ERROR 1146 (42S02) at line 3: Table 'shop.orders' doesn't exist",
        '',
    ].join('\n'));

    assert.deepEqual(summary.critical, [
        "ERROR 1146 (42S02) at line 3: Table 'shop.orders' doesn't exist",
    ]);
    assert.deepEqual(summary.counts, {
        object_exists: 1,
        duplicate_key: 2,
        record_not_found: 0,
        password_warning: 0,
    });
});
