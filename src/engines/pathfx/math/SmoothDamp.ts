import * as BABYLON from '@babylonjs/core';

/**
 * Critically damped spring toward `target` (Game Programming Gems 4, ch. 1.10).
 *
 * `velocity` is updated in place and must be owned by the caller.
 * The result never overshoots the target.
 */
export function smoothDampVector2ToRef(
    current: BABYLON.Vector2,
    target: BABYLON.Vector2,
    velocity: BABYLON.Vector2,
    smoothTime: number,
    deltaTime: number,
    result: BABYLON.Vector2
): BABYLON.Vector2 {
    const time = Math.max(0.0001, smoothTime);
    const omega = 2 / time;
    const x = omega * deltaTime;
    const exp = 1 / (1 + x + 0.48 * x * x + 0.235 * x * x * x);

    const changeX = current.x - target.x;
    const changeY = current.y - target.y;
    const goalX = target.x;
    const goalY = target.y;

    const tempX = (velocity.x + omega * changeX) * deltaTime;
    const tempY = (velocity.y + omega * changeY) * deltaTime;

    velocity.x = (velocity.x - omega * tempX) * exp;
    velocity.y = (velocity.y - omega * tempY) * exp;

    let outX = current.x - changeX + (changeX + tempX) * exp;
    let outY = current.y - changeY + (changeY + tempY) * exp;

    // overshoot guard
    const toGoalX = goalX - current.x;
    const toGoalY = goalY - current.y;
    if (toGoalX * (outX - goalX) + toGoalY * (outY - goalY) > 0 && deltaTime > 0) {
        outX = goalX;
        outY = goalY;
        velocity.x = (outX - goalX) / deltaTime;
        velocity.y = (outY - goalY) / deltaTime;
    }

    result.set(outX, outY);
    return result;
}
